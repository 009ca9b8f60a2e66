/**
 * Unit Tests: CLI output helpers
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { printFailure } from '../../src/utils/output.js';

describe('printFailure', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('prints a failed result as the only JSON on stdout', () => {
    printFailure('Push failed: Missing GitLab settings', 'json');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      success: false,
      message: 'Push failed: Missing GitLab settings',
    });
  });

  it('prints a plain error line in human mode', () => {
    printFailure('Push failed: Missing GitLab settings', 'human');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][1]).toBe('Push failed: Missing GitLab settings');
  });
});
