/**
 * Tests for CLI UI helpers outside a terminal
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import * as ui from '../../src/cli/ui.js'
import { waitWithSpinner } from '../../src/cli/lib/context.js'

describe('ui', () => {
  let stderr: MockInstance<typeof console.error>

  beforeEach(() => {
    stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    stderr.mockRestore()
  })

  describe('formatSimpleTable', () => {
    it.skipIf(ui.isTTY)('should emit tab-separated rows when piped', () => {
      expect(ui.formatSimpleTable(['#', 'Key'], [['01', 'iq'], ['05', 'memory']]))
        .toBe('#\tKey\n01\tiq\n05\tmemory')
    })
  })

  describe.skipIf(ui.isStderrTTY)('withSpinner without a terminal', () => {
    it('should print the text and the success line', async () => {
      const result = await ui.withSpinner('Rendering', async () => 7, { successText: 'Rendered' })

      expect(result).toBe(7)
      expect(stderr.mock.calls).toEqual([['Rendering'], ['✓ Rendered']])
    })

    it('should print the failure line and rethrow', async () => {
      await expect(ui.withSpinner('Rendering', async () => { throw new Error('boom') }, { failText: 'Render failed' }))
        .rejects.toThrow('boom')
      expect(stderr.mock.calls).toEqual([['Rendering'], ['✗ Render failed']])
    })
  })

  describe.skipIf(ui.isStderrTTY)('waitWithSpinner without a terminal', () => {
    it('should wait the full enrichment delay', async () => {
      vi.useFakeTimers()
      try {
        let done = false
        const pending = waitWithSpinner(30_000).then(() => { done = true })

        await vi.advanceTimersByTimeAsync(29_999)
        expect(done).toBe(false)
        await vi.advanceTimersByTimeAsync(1)
        await pending

        expect(done).toBe(true)
        expect(stderr.mock.calls).toEqual([['Waiting 30s for enrichment'], ['✓ Enrichment wait finished']])
      } finally {
        vi.useRealTimers()
      }
    })
  })
})
