import { Intent } from '../types/domain';

/**
 * Intent Classifier
 *
 * Keyword rules evaluated in priority order. The first rule that matches wins,
 * so "yes, 10am works" is a confirmation rather than a time proposal.
 */

interface IntentRule {
  intent: Intent;
  pattern: RegExp;
}

const RULES: IntentRule[] = [
  {
    intent: 'confirm',
    pattern: /\b(yes|yeah|yep|ok|okay|confirm|confirmed)\b/i,
  },
  {
    intent: 'reschedule',
    pattern: /\b(reschedule|another time|move|change)\b/i,
  },
  {
    intent: 'cancel',
    pattern: /\b(cancel|canceled|cancelled|decline|can't make it|cannot make it)\b/i,
  },
  {
    intent: 'time',
    pattern: /\b\d{1,2}(?::\d{2})?\s*(?:am|pm)?\b/i,
  },
];

export function classifyIntent(text: string | null | undefined): Intent {
  if (!text) {
    return 'other';
  }

  // Curly apostrophes from phone keyboards
  const normalized = text.replace(/’/g, "'");

  for (const rule of RULES) {
    if (rule.pattern.test(normalized)) {
      return rule.intent;
    }
  }
  return 'other';
}
