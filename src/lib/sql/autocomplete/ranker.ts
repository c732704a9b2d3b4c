/**
 * Ranker Module
 *
 * Match quality is the primary criterion:
 * - Match tiers: exact > prefix > contains > fuzzy (never cross tiers)
 * - Within a tier, candidate type priority decides, then the name
 * - With nothing typed every candidate sits in the `none` tier
 */

import type { Candidate, CandidateType, MatchType, RankedSuggestion, RankingConfig } from './types'

// Match type tier multipliers - creates non-overlapping score ranges
// Each tier is separated by 10000 points, ensuring match quality always wins
const MATCH_TIER: Record<MatchType, number> = {
  exact: 40000,
  prefix: 30000,
  contains: 20000,
  fuzzy: 10000,
  none: 0, // No partial typed - pure type ordering
}

// Default type priority order (earlier = higher priority)
const DEFAULT_TYPE_PRIORITY: CandidateType[] = [
  'column',
  'join',
  'cte',
  'temp_table',
  'table',
  'view',
  'procedure',
  'schema',
  'database',
  'keyword',
]

// Per position in the priority list; the whole list stays under one tier
const TYPE_STEP = 100

/**
 * Rank candidates against the typed prefix.
 *
 * score = MATCH_TIER[matchType] + type bonus. Candidates that do not match a
 * non-empty prefix are dropped.
 */
export function rankCandidates(
  candidates: Candidate[],
  partial: string | null,
  config?: Partial<RankingConfig>
): RankedSuggestion[] {
  const typePreference = config?.typePreference ?? DEFAULT_TYPE_PRIORITY

  const ranked: RankedSuggestion[] = []
  for (const candidate of candidates) {
    const matchType = computeMatchType(candidate.value, partial)
    if (partial && matchType === 'none') continue
    ranked.push({
      ...candidate,
      score: MATCH_TIER[matchType] + typeBonus(candidate.type, typePreference),
      matchType,
    })
  }

  // Sort by score descending, then alphabetically
  return ranked.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score
    return a.value.localeCompare(b.value)
  })
}

function typeBonus(type: CandidateType, preference: CandidateType[]): number {
  const index = preference.indexOf(type)
  if (index === -1) return 0
  return (preference.length - index) * TYPE_STEP
}

/**
 * Compute match type between candidate value and partial input.
 */
export function computeMatchType(value: string, partial: string | null): MatchType {
  if (!partial) return 'none'

  const valueLower = value.toLowerCase()
  const partialLower = partial.toLowerCase()

  if (valueLower === partialLower) return 'exact'
  if (valueLower.startsWith(partialLower)) return 'prefix'
  if (valueLower.includes(partialLower)) return 'contains'
  if (fuzzyMatch(valueLower, partialLower)) return 'fuzzy'
  return 'none'
}

/**
 * Simple fuzzy matching: all characters of pattern appear in value in order.
 */
function fuzzyMatch(value: string, pattern: string): boolean {
  let patternIdx = 0

  for (let i = 0; i < value.length && patternIdx < pattern.length; i++) {
    if (value[i] === pattern[patternIdx]) {
      patternIdx++
    }
  }

  return patternIdx === pattern.length
}

/**
 * Check if a value matches a partial pattern.
 * Returns true if there's any match (exact, prefix, contains, or fuzzy).
 */
export function isMatch(value: string, partial: string | null): boolean {
  return computeMatchType(value, partial) !== 'none'
}

/**
 * Deduplicate candidates by type and value, keeping the highest scored.
 */
export function deduplicateCandidates(candidates: RankedSuggestion[]): RankedSuggestion[] {
  const seen = new Map<string, RankedSuggestion>()

  for (const candidate of candidates) {
    const key = `${candidate.type}:${candidate.value.toLowerCase()}`
    const existing = seen.get(key)

    if (!existing || candidate.score > existing.score) {
      seen.set(key, candidate)
    }
  }

  return Array.from(seen.values())
}

/**
 * Limit the number of suggestions returned.
 */
export function limitSuggestions(suggestions: RankedSuggestion[], limit: number = 50): RankedSuggestion[] {
  return suggestions.slice(0, limit)
}
