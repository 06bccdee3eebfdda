import { describe, test, expect, vi } from 'vitest';
import { runSmoke } from '../app.js';
import type { SmokeResult } from '../../shared/types.js';

describe('runSmoke', () => {
  test('passes a smoke result through', async () => {
    const smokeFn = vi.fn(async (): Promise<SmokeResult> => ({ ok: true, title: 'Example Domain' }));
    expect(await runSmoke(smokeFn)).toEqual({ ok: true, title: 'Example Domain' });
  });

  test('turns a rejected check into a failed result', async () => {
    const smokeFn = vi.fn(async (): Promise<SmokeResult> => {
      throw new Error('browser crashed');
    });
    expect(await runSmoke(smokeFn)).toEqual({ ok: false, error: 'browser crashed' });
  });
});
