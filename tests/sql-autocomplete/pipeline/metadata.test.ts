// tests/sql-autocomplete/pipeline/metadata.test.ts

import { describe, it, expect } from 'vitest'
import {
  CompletionRequestTracker,
  createSchemaMetadataResolver,
  runMetadataRequest,
} from '../../../src/lib/sql/autocomplete/metadata'
import { testSchema } from '../../test-utils'

describe('Metadata', () => {
  describe('runMetadataRequest', () => {
    it('wraps a value', async () => {
      const outcome = await runMetadataRequest(new AbortController().signal, async () => 42)
      expect(outcome).toEqual({ status: 'ok', value: 42 })
    })

    it('returns a failure as a value', async () => {
      const outcome = await runMetadataRequest(new AbortController().signal, async () => {
        throw new Error('timeout')
      })
      expect(outcome.status).toBe('error')
      if (outcome.status === 'error') expect(outcome.error.message).toBe('timeout')
    })

    it('wraps a non-Error rejection', async () => {
      const outcome = await runMetadataRequest(new AbortController().signal, () => Promise.reject('refused'))
      expect(outcome.status).toBe('error')
      if (outcome.status === 'error') expect(outcome.error.message).toBe('refused')
    })

    it('does not call the lookup once aborted', async () => {
      const controller = new AbortController()
      controller.abort()
      let called = false
      const outcome = await runMetadataRequest(controller.signal, async () => {
        called = true
        return 1
      })
      expect(outcome).toEqual({ status: 'cancelled' })
      expect(called).toBe(false)
    })

    it('discards a result that arrives after abort', async () => {
      const controller = new AbortController()
      const outcome = await runMetadataRequest(controller.signal, async () => {
        controller.abort()
        return 1
      })
      expect(outcome).toEqual({ status: 'cancelled' })
    })

    it('passes the signal through', async () => {
      const controller = new AbortController()
      const outcome = await runMetadataRequest(controller.signal, async (signal) => signal === controller.signal)
      expect(outcome).toEqual({ status: 'ok', value: true })
    })
  })

  describe('createSchemaMetadataResolver', () => {
    const resolver = createSchemaMetadataResolver(testSchema)

    it('resolves case-insensitively in the default schema', async () => {
      const found = await resolver.resolveTable({ name: 'employees' })
      expect(found?.schema).toBe('dbo')
      expect(found?.name).toBe('Employees')
    })

    it('resolves an explicit schema', async () => {
      expect((await resolver.resolveTable({ schema: 'sales', name: 'Orders' }))?.name).toBe('Orders')
      expect(await resolver.resolveTable({ schema: 'dbo', name: 'Orders' })).toBeNull()
    })

    it('knows only the connected database', async () => {
      expect((await resolver.resolveTable({ database: 'hr', name: 'Employees' }))?.name).toBe('Employees')
      expect(await resolver.resolveTable({ database: 'Archive', name: 'Employees' })).toBeNull()
    })

    it('lists foreign keys', async () => {
      const orders = await resolver.resolveTable({ schema: 'sales', name: 'Orders' })
      if (!orders) throw new Error('Orders not found')
      expect(await resolver.getConstraints(orders)).toEqual([
        {
          type: 'FOREIGN KEY',
          name: 'FK_Orders_Employees',
          columns: ['EmployeeID'],
          referencedSchema: 'dbo',
          referencedTable: 'Employees',
          referencedColumns: ['EmployeeID'],
        },
      ])
    })

    it('returns no foreign keys for a table without them', async () => {
      const departments = await resolver.resolveTable({ name: 'Departments' })
      if (!departments) throw new Error('Departments not found')
      expect(await resolver.getConstraints(departments)).toEqual([])
    })
  })

  describe('CompletionRequestTracker', () => {
    it('aborts the previous request when a new one begins', () => {
      const tracker = new CompletionRequestTracker()
      const first = tracker.begin()
      const second = tracker.begin()
      expect(first.signal.aborted).toBe(true)
      expect(second.signal.aborted).toBe(false)
      expect(tracker.isCurrent(first.id)).toBe(false)
      expect(tracker.isCurrent(second.id)).toBe(true)
      expect(tracker.currentId).toBe(2)
    })

    it('cancel aborts the current request', () => {
      const tracker = new CompletionRequestTracker()
      const request = tracker.begin()
      tracker.cancel()
      expect(request.signal.aborted).toBe(true)
      expect(tracker.isCurrent(request.id)).toBe(false)
    })

    it('nothing is current before the first request', () => {
      expect(new CompletionRequestTracker().isCurrent(0)).toBe(false)
    })
  })
})
