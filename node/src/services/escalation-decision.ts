// src/services/escalation-decision.ts
// Compares the confidence score with the configured threshold. A score equal to the
// threshold is accepted. Anything that prevents a comparison escalates.
import { logger } from './logger';
import { errorMessage } from '@/utils/errors';

export interface EscalationDecision {
  escalated: boolean;
  reason?: string;
}

const REASON_DIGITS = 2;
const MAX_REASON_DIGITS = 6;

/** Two decimals, or as many more as it takes for the score to print below the threshold. */
function formatPair(score: number, threshold: number): [string, string] {
  let digits = REASON_DIGITS;
  while (digits < MAX_REASON_DIGITS && score.toFixed(digits) === threshold.toFixed(digits)) digits++;
  return [score.toFixed(digits), threshold.toFixed(digits)];
}

function belowThresholdReason(score: number, threshold: number): string {
  const [shownScore, shownThreshold] = formatPair(score, threshold);
  return `Confidence score (${shownScore}) below threshold (${shownThreshold})`;
}

export function decideEscalation(score: number | undefined, threshold: number): EscalationDecision {
  try {
    if (score === undefined || !Number.isFinite(score)) {
      throw new Error(`confidence score unavailable (${String(score)})`);
    }
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new Error(`invalid escalation threshold (${String(threshold)})`);
    }

    const escalated = score < threshold;
    const decision: EscalationDecision = escalated
      ? { escalated, reason: belowThresholdReason(score, threshold) }
      : { escalated };

    logger.info('decision:done', { score, threshold, escalated });
    return decision;
  } catch (err) {
    const message = errorMessage(err);
    logger.error('decision:failed', { error: message });
    return { escalated: true, reason: `Decision error: ${message}` };
  }
}
