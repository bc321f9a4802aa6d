import { createRetryPolicy, runWithRetry, withTimeout } from './retry-policy.js'
import { ReadTimeoutError } from '../../domain/errors/read-timeout-error.js'
import { err, ok, type Result } from '../../domain/result.js'

describe('runWithRetry', () => {
  it('sleeps before every retry and stops at the first success', async () => {
    const waits: number[] = []
    const outcomes: Result<string, string>[] = [err('e1'), err('e2'), ok('data')]
    const attempt = jest.fn(async (n: number) => outcomes[n - 1])

    const result = await runWithRetry(createRetryPolicy(5, 50), attempt, {
      sleep: async (ms) => {
        waits.push(ms)
      },
    })

    expect(result).toEqual({ ok: true, value: 'data' })
    expect(attempt).toHaveBeenCalledTimes(3)
    expect(waits).toEqual([50, 50])
  })

  it('returns the last failure once the policy is exhausted', async () => {
    const retries: Array<[string, number]> = []
    const attempt = jest.fn(async (n: number): Promise<Result<never, string>> => err(`fail-${n}`))

    const result = await runWithRetry(createRetryPolicy(3, 0), attempt, {
      sleep: async () => undefined,
      onRetry: (error, next) => {
        retries.push([error, next])
      },
    })

    expect(result).toEqual({ ok: false, error: 'fail-3' })
    expect(retries).toEqual([
      ['fail-1', 2],
      ['fail-2', 3],
    ])
  })

  it('stops at the first failure that is not worth retrying', async () => {
    const sleeper = jest.fn(async () => undefined)
    const outcomes: Result<never, string>[] = [err('transient'), err('permanent'), err('transient')]
    const attempt = jest.fn(async (n: number) => outcomes[n - 1])

    const result = await runWithRetry(createRetryPolicy(5, 10), attempt, {
      sleep: sleeper,
      shouldRetry: (error) => error !== 'permanent',
    })

    expect(result).toEqual({ ok: false, error: 'permanent' })
    expect(attempt).toHaveBeenCalledTimes(2)
    expect(sleeper).toHaveBeenCalledTimes(1)
  })

  it('does not wait when a single attempt is allowed', async () => {
    const sleeper = jest.fn(async () => undefined)
    await runWithRetry(createRetryPolicy(1, 1_000), async () => err('x'), { sleep: sleeper })
    expect(sleeper).not.toHaveBeenCalled()
  })

  it('rejects policies without any attempt', () => {
    expect(() => createRetryPolicy(0, 10)).toThrow(RangeError)
    expect(() => createRetryPolicy(2, -1)).toThrow(RangeError)
  })
})

describe('withTimeout', () => {
  beforeEach(() => jest.useFakeTimers())
  afterEach(() => jest.useRealTimers())

  it('passes through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'readBlock')).resolves.toBe(42)
    expect(jest.getTimerCount()).toBe(0)
  })

  it('rejects with ReadTimeoutError when the operation hangs', async () => {
    const pending = withTimeout(new Promise<number>(() => undefined), 50, 'readBlock')
    const assertion = expect(pending).rejects.toMatchObject({
      name: 'ReadTimeoutError',
      operation: 'readBlock',
      timeoutMs: 50,
    })

    await jest.advanceTimersByTimeAsync(50)
    await assertion
    await expect(pending).rejects.toBeInstanceOf(ReadTimeoutError)
  })
})
