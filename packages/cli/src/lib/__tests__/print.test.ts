import { describe, it, expect } from 'vitest'
import { describePullEvent } from '../print.ts'

describe('describePullEvent', () => {
  it('shows a bare status as is', () => {
    expect(describePullEvent({ status: 'pulling manifest' })).toBe('pulling manifest')
  })

  it('adds the digest and the share downloaded', () => {
    expect(
      describePullEvent({
        status: 'downloading',
        digest: 'sha256:4f2a8c1d9e7b6a5f4e3d',
        total: 2048,
        completed: 512,
      })
    ).toBe('downloading sha256:4f2a8c1d9e7b 25% of 2.0 KB')
  })

  it('does not repeat a digest the status already names', () => {
    expect(describePullEvent({ status: 'pulling sha256:4f2a', digest: 'sha256:4f2a' })).toBe('pulling sha256:4f2a')
  })
})
