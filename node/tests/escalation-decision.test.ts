import { decideEscalation } from '@/services/escalation-decision';

describe('decideEscalation', () => {
  it('accepts a score equal to the threshold', () => {
    expect(decideEscalation(0.95, 0.95)).toEqual({ escalated: false });
  });

  it('accepts a score above the threshold', () => {
    expect(decideEscalation(0.97, 0.95)).toEqual({ escalated: false });
  });

  it('escalates a score below the threshold with a reason', () => {
    expect(decideEscalation(0.8, 0.95)).toEqual({
      escalated: true,
      reason: 'Confidence score (0.80) below threshold (0.95)',
    });
  });

  it('prints more digits when two would show the score at the threshold', () => {
    expect(decideEscalation(0.949, 0.95)).toEqual({
      escalated: true,
      reason: 'Confidence score (0.949) below threshold (0.950)',
    });
    expect(decideEscalation(0.9499, 0.95).reason).toBe('Confidence score (0.9499) below threshold (0.9500)');
  });

  it('escalates a zero score', () => {
    expect(decideEscalation(0, 0.5).escalated).toBe(true);
  });

  it('escalates when the score is missing', () => {
    expect(decideEscalation(undefined, 0.95)).toEqual({
      escalated: true,
      reason: 'Decision error: confidence score unavailable (undefined)',
    });
  });

  it('escalates when the score is not a number', () => {
    expect(decideEscalation(Number.NaN, 0.95)).toEqual({
      escalated: true,
      reason: 'Decision error: confidence score unavailable (NaN)',
    });
  });

  it('escalates when the threshold is out of range', () => {
    expect(decideEscalation(0.9, 1.5)).toEqual({
      escalated: true,
      reason: 'Decision error: invalid escalation threshold (1.5)',
    });
  });
});
