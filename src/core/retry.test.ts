import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RetryExhaustedError, backoffDelay, withRetry } from './retry';

const POLICY = { attempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };

describe('backoffDelay', () => {
    it('doubles per attempt, adds jitter and caps at the maximum', () => {
        assert.strictEqual(backoffDelay(0, POLICY, () => 0), 100);
        assert.strictEqual(backoffDelay(1, POLICY, () => 0), 200);
        assert.strictEqual(backoffDelay(2, POLICY, () => 0.5), 450);
        assert.strictEqual(backoffDelay(5, POLICY, () => 0), 1000);
    });
});

describe('withRetry', () => {
    it('returns the first success and reports earlier failures', async () => {
        const delays: number[] = [];
        const retried: number[] = [];
        const result = await withRetry(async (attempt) => {
            if (attempt < 3) throw new Error(`boom ${attempt}`);
            return 'ok';
        }, {
            ...POLICY,
            random: () => 0,
            sleep: async (ms) => { delays.push(ms); },
            onRetry: (_err, attempt) => { retried.push(attempt); },
        });

        assert.strictEqual(result, 'ok');
        assert.deepStrictEqual(delays, [100, 200]);
        assert.deepStrictEqual(retried, [1, 2]);
    });

    it('gives up after the configured attempts', async () => {
        let calls = 0;
        await assert.rejects(
            () => withRetry(async () => { calls++; throw new Error('connection refused'); }, {
                ...POLICY,
                sleep: async () => {},
            }),
            (err: unknown) => {
                assert.ok(err instanceof RetryExhaustedError);
                assert.strictEqual(err.attempts, 3);
                assert.strictEqual(err.message, 'Gave up after 3 attempt(s): connection refused');
                return true;
            }
        );
        assert.strictEqual(calls, 3);
    });

    it('rethrows at once when the error is not retryable', async () => {
        let calls = 0;
        const fatal = new Error('bad request');
        await assert.rejects(
            () => withRetry(async () => { calls++; throw fatal; }, {
                ...POLICY,
                isRetryable: () => false,
                sleep: async () => {},
            }),
            (err: unknown) => err === fatal
        );
        assert.strictEqual(calls, 1);
    });

    it('runs once when attempts is below one', async () => {
        let calls = 0;
        await assert.rejects(() => withRetry(async () => { calls++; throw new Error('x'); }, {
            attempts: 0,
            baseDelayMs: 0,
            maxDelayMs: 0,
        }), RetryExhaustedError);
        assert.strictEqual(calls, 1);
    });
});
