// Word corpus for the test. Samples are drawn from here without replacement.
export const DEFAULT_CORPUS: readonly string[] = [
  'hello', 'world', 'rust', 'speed', 'test', 'keyboard',
  'fast', 'typing', 'game', 'challenge', 'performance', 'accuracy',
];

export const SAMPLE_SIZE = 10;
