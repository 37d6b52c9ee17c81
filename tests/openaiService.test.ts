import { describe, expect, it } from 'vitest';
import { mapRunStatus } from '../src/services/openaiService';

describe('mapRunStatus', () => {
  it('passes through the states the run machine knows', () => {
    expect(['queued', 'in_progress', 'requires_action', 'completed', 'failed', 'cancelled'].map(mapRunStatus))
      .toEqual(['queued', 'in_progress', 'requires_action', 'completed', 'failed', 'cancelled']);
  });

  it('keeps a cancelling run active and fails expired or incomplete ones', () => {
    expect(mapRunStatus('cancelling')).toBe('in_progress');
    expect(mapRunStatus('expired')).toBe('failed');
    expect(mapRunStatus('incomplete')).toBe('failed');
  });
});
