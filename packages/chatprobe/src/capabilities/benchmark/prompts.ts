/** Short imperative requests typical of spoken commands to a tabletop robot. */
export const DEFAULT_BENCHMARK_PROMPTS: readonly string[] = [
  'Could you pass me the blue cup on the shelf?',
  'Please turn around and face the window.',
  'Tell me what you can see in front of you.',
  'Wait a moment, I will be right back.',
  'Can you move a little closer to me?',
  'Remind me what we talked about earlier.',
  'Raise your right arm, please.',
  'Is it okay if I ask you a few questions?',
  'Stop moving and stay where you are.',
  'Say goodbye to our visitor.'
];
