import { describe, it, expect } from 'vitest';
import { linkedController, withDeadline } from '../../../src/utils/abort.js';
import { sleep } from '../../../src/utils/retry.js';
import { CancelledError } from '../../../src/core/errors.js';

describe('linkedController()', () => {
  it('should abort when any outer signal aborts', () => {
    const a = new AbortController();
    const b = new AbortController();
    const { controller } = linkedController(a.signal, undefined, b.signal);

    b.abort();
    expect(controller.signal.aborted).toBe(true);
  });

  it('should start aborted when an outer signal already is', () => {
    const { controller } = linkedController(AbortSignal.abort());
    expect(controller.signal.aborted).toBe(true);
  });

  it('should stop following outer signals after dispose', () => {
    const outer = new AbortController();
    const { controller, dispose } = linkedController(outer.signal);

    dispose();
    outer.abort();
    expect(controller.signal.aborted).toBe(false);
  });
});

describe('withDeadline()', () => {
  it('should report a timeout separately from an outer abort', async () => {
    let expired = false;

    await expect(
      withDeadline(10, undefined, async (signal, timedOut) => {
        try {
          await sleep(1000, signal);
        } finally {
          expired = timedOut();
        }
      }),
    ).rejects.toBeInstanceOf(CancelledError);

    expect(expired).toBe(true);
  });

  it('should not flag a timeout when the outer signal aborts', async () => {
    const outer = new AbortController();
    let expired = true;
    setTimeout(() => outer.abort(), 5);

    await expect(
      withDeadline(1000, outer.signal, async (signal, timedOut) => {
        try {
          await sleep(500, signal);
        } finally {
          expired = timedOut();
        }
      }),
    ).rejects.toBeInstanceOf(CancelledError);

    expect(expired).toBe(false);
  });

  it('should return the function result', async () => {
    await expect(withDeadline(100, undefined, async () => 'done')).resolves.toBe('done');
  });
});
