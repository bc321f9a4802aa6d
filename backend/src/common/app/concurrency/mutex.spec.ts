import { Mutex } from './mutex.js'

describe('Mutex', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const mutex = new Mutex()
    const events: string[] = []
    let releaseFirst: () => void = () => undefined

    const first = mutex.runExclusive(async () => {
      events.push('a:start')
      await new Promise<void>((r) => {
        releaseFirst = r
      })
      events.push('a:end')
      return 'a'
    })
    const second = mutex.runExclusive(async () => {
      events.push('b:start')
      return 'b'
    })

    await new Promise((r) => setImmediate(r))
    expect(mutex.queued).toBe(2)
    expect(events).toEqual(['a:start'])

    releaseFirst()
    await expect(Promise.all([first, second])).resolves.toEqual(['a', 'b'])
    expect(events).toEqual(['a:start', 'a:end', 'b:start'])
    expect(mutex.queued).toBe(0)
  })

  it('releases the lock when a task rejects', async () => {
    const mutex = new Mutex()
    await expect(mutex.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next')
  })
})
