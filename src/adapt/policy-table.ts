export type PolicyDifficulty = 'easy' | 'normal' | 'hard';

export interface AdaptationPolicy {
  readonly strategy: string;
  readonly difficulty: PolicyDifficulty;
  readonly activities?: readonly string[];
}

const NEUTRAL_POLICY: AdaptationPolicy = {
  strategy: 'Keep steady',
  difficulty: 'normal',
};

// Exact-match keys; anything else resolves to neutral.
const POLICIES: ReadonlyMap<string, AdaptationPolicy> = new Map<
  string,
  AdaptationPolicy
>([
  [
    'sad',
    {
      strategy: 'Make it playful',
      difficulty: 'normal',
      activities: ['puzzle', 'flashcards'],
    },
  ],
  ['confused', { strategy: 'Simplify & add examples', difficulty: 'easy' }],
  ['angry', { strategy: 'Calm & simplify', difficulty: 'easy' }],
  ['happy', { strategy: 'Challenge more', difficulty: 'hard' }],
  ['neutral', NEUTRAL_POLICY],
]);

export function lookupPolicy(
  emotion: string | null | undefined,
): AdaptationPolicy {
  return (emotion && POLICIES.get(emotion)) || NEUTRAL_POLICY;
}

export function suggestedIntro(policy: AdaptationPolicy): string {
  switch (policy.difficulty) {
    case 'easy':
      return 'Step-by-step explanation: ';
    case 'hard':
      return 'Advanced challenge: ';
    default:
      return policy.activities ? 'Interactive mode: ' : 'Focus mode: ';
  }
}
