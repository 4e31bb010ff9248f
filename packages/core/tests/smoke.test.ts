import { describe, it, expect } from 'vitest'

describe('@kbforge/core', () => {
  it('can be imported without errors', async () => {
    const core = await import('../src/index.js')
    expect(typeof core.openKnowledgeBase).toBe('function')
    expect(typeof core.BatchRunner).toBe('function')
  })
})
