export const SYSTEM_PROMPT =
  'You are EduSense, an emotion-aware learning assistant. ' +
  'Your goal is to teach clearly and adaptively. ' +
  'Tone rules by emotion: sad=gently encouraging; confused=clear step-by-step with examples; ' +
  'angry=calm and concise; happy=enthusiastic and challenging; neutral=friendly and helpful. ' +
  'Always be supportive, focus on pedagogy (Socratic questions, bite-sized steps), and avoid long tangents.';

const TONES: ReadonlyMap<string, string> = new Map([
  ['sad', 'gentle and encouraging'],
  ['confused', 'clear and step-by-step'],
  ['angry', 'calm and concise'],
  ['happy', 'enthusiastic and challenging'],
]);

const DEFAULT_TONE = 'friendly and helpful';

export function toneFor(emotionHint: string | null | undefined): string {
  return (emotionHint && TONES.get(emotionHint)) || DEFAULT_TONE;
}

export function systemInstruction(emotionHint: string | null | undefined): string {
  if (!emotionHint) return SYSTEM_PROMPT;
  return `${SYSTEM_PROMPT} Current learner emotional state: ${emotionHint}. Adjust tone accordingly.`;
}

export function fallbackReply(
  message: string,
  emotionHint: string | null | undefined,
): string {
  return `In a ${toneFor(emotionHint)} tone: I hear you said: '${message}'. Let's work through this together.`;
}
