import { MOOD_LABELS } from '../../shared/types';
import type { EscalationDetection } from './detector';

export interface AlertMessage {
  title: string;
  body: string;
}

export function alertMessage(detection: EscalationDetection, displayName: string | null): AlertMessage {
  const name = displayName ?? 'this client';

  switch (detection.kind) {
    case 'highPain':
      return {
        title: 'High pain alert',
        body: `${name} reported pain ${detection.painLevel}/10. Notify an admin to follow up.`,
      };
    case 'lowMood':
      return {
        title: 'Low mood alert',
        body: `${name} reported mood "${MOOD_LABELS[detection.mood]}". Consider proactive outreach.`,
      };
    case 'rapidPainIncrease':
      return {
        title: 'Pain trending up',
        body: `${name}'s pain climbed from ${detection.fromPain}/10 to ${detection.toPain}/10 in the last few days.`,
      };
    case 'rapidMoodDrop': {
      const previous = detection.previousMood ? MOOD_LABELS[detection.previousMood] : 'recent days';
      return {
        title: 'Mood worsening quickly',
        body: `${name}'s mood dropped to Sad from ${previous}. Review their check-ins.`,
      };
    }
  }
}

/** One-line digest detail for an at-risk subject */
export function digestDetail(detection: EscalationDetection): string {
  switch (detection.kind) {
    case 'highPain':
      return `High pain ${detection.painLevel}/10`;
    case 'lowMood':
      return `Low mood (${MOOD_LABELS[detection.mood]})`;
    case 'rapidPainIncrease':
      return `Pain up ${detection.fromPain}→${detection.toPain}`;
    case 'rapidMoodDrop':
      return detection.pattern === 'dropFromBetter' && detection.previousMood
        ? `Mood down from ${MOOD_LABELS[detection.previousMood]}`
        : 'Mood stayed Sad';
  }
}
