// tests/sql-autocomplete/pipeline/ranker.test.ts

import { describe, it, expect } from 'vitest'
import {
  rankCandidates,
  deduplicateCandidates,
  limitSuggestions,
  computeMatchType,
  isMatch,
} from '../../../src/lib/sql/autocomplete/ranker'
import type { Candidate, CandidateType, MatchType } from '../../../src/lib/sql/autocomplete/types'

// ============================================================================
// TEST HELPERS
// ============================================================================

function c(value: string, type: CandidateType, source: Candidate['source'] = 'schema'): Candidate {
  return { type, value, displayText: value, source }
}

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface MatchTestCase {
  value: string
  partial: string | null
  expected: MatchType
}

interface RankTestCase {
  name: string
  candidates: Candidate[]
  partial: string | null
  expected: string[]
}

// ============================================================================
// TEST DATA
// ============================================================================

const matchTests: MatchTestCase[] = [
  { value: 'Employees', partial: 'employees', expected: 'exact' },
  { value: 'Employees', partial: 'emp', expected: 'prefix' },
  { value: 'ActiveEmployees', partial: 'emp', expected: 'contains' },
  { value: 'DepartmentID', partial: 'dpid', expected: 'fuzzy' },
  { value: 'Salary', partial: 'xyz', expected: 'none' },
  { value: 'Salary', partial: null, expected: 'none' },
  { value: 'Salary', partial: '', expected: 'none' },
]

const rankTests: RankTestCase[] = [
  {
    name: 'match tier beats candidate type',
    candidates: [c('ActiveEmployees', 'column'), c('Employees', 'table'), c('EmployeeID', 'column')],
    partial: 'emp',
    expected: ['EmployeeID', 'Employees', 'ActiveEmployees'],
  },
  {
    name: 'exact match first',
    candidates: [c('Names', 'column'), c('Name', 'table')],
    partial: 'name',
    expected: ['Name', 'Names'],
  },
  {
    name: 'type priority within a tier',
    candidates: [c('DepartmentsView', 'view'), c('Departments', 'table'), c('DepartmentID', 'column')],
    partial: 'dep',
    expected: ['DepartmentID', 'Departments', 'DepartmentsView'],
  },
  {
    name: 'alphabetical within a type',
    candidates: [c('Salary', 'column'), c('HireDate', 'column'), c('LastName', 'column')],
    partial: null,
    expected: ['HireDate', 'LastName', 'Salary'],
  },
  {
    name: 'JOIN suggestions rank above tables',
    candidates: [c('Projects', 'table'), c('Departments d ON d.DepartmentID = e.DepartmentID', 'join', 'foreign_key')],
    partial: null,
    expected: ['Departments d ON d.DepartmentID = e.DepartmentID', 'Projects'],
  },
  {
    name: 'non-matching candidates are dropped',
    candidates: [c('Salary', 'column'), c('Budget', 'column')],
    partial: 'sal',
    expected: ['Salary'],
  },
]

// ============================================================================
// TESTS
// ============================================================================

describe('Ranker', () => {
  describe('computeMatchType', () => {
    for (const tc of matchTests) {
      it(`${tc.value} / ${String(tc.partial)} -> ${tc.expected}`, () => {
        expect(computeMatchType(tc.value, tc.partial)).toBe(tc.expected)
      })
    }

    it('isMatch reports any match', () => {
      expect(isMatch('DepartmentID', 'dpid')).toBe(true)
      expect(isMatch('Salary', 'xyz')).toBe(false)
    })
  })

  describe('rankCandidates', () => {
    for (const tc of rankTests) {
      it(tc.name, () => {
        const ranked = rankCandidates(tc.candidates, tc.partial)
        expect(ranked.map((r) => r.value)).toEqual(tc.expected)
      })
    }

    it('records match type and score', () => {
      const [ranked] = rankCandidates([c('Employees', 'table')], 'emp')
      expect(ranked.matchType).toBe('prefix')
      // prefix tier plus the table's place in the type order
      expect(ranked.score).toBe(30000 + 6 * 100)
    })

    it('honours a custom type preference', () => {
      const ranked = rankCandidates([c('Employees', 'table'), c('EmployeeID', 'column')], 'emp', {
        typePreference: ['table', 'column'],
      })
      expect(ranked.map((r) => r.value)).toEqual(['Employees', 'EmployeeID'])
    })
  })

  describe('deduplicateCandidates', () => {
    it('keeps the higher score for the same type and name', () => {
      const ranked = rankCandidates([c('Employees', 'table'), c('employees', 'table')], null)
      const lower = { ...ranked[1], score: ranked[1].score - 50 }
      const deduped = deduplicateCandidates([lower, ranked[0]])
      expect(deduped).toHaveLength(1)
      expect(deduped[0].score).toBe(ranked[0].score)
    })

    it('keeps the same name under different types', () => {
      const ranked = rankCandidates([c('Departments', 'table'), c('Departments', 'cte')], null)
      expect(deduplicateCandidates(ranked)).toHaveLength(2)
    })
  })

  describe('limitSuggestions', () => {
    it('defaults to fifty', () => {
      const many = rankCandidates(
        Array.from({ length: 60 }, (_, i) => c(`col${i}`, 'column')),
        null
      )
      expect(limitSuggestions(many)).toHaveLength(50)
      expect(limitSuggestions(many, 5)).toHaveLength(5)
    })
  })
})
