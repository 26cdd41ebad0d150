import { formatSpan, formatTimestamp, pluralize, truncate } from '../../src/utils/time.js';

describe('formatTimestamp', () => {
  it('renders UTC minutes', () => {
    expect(formatTimestamp(new Date('2025-01-15T10:04:59.000Z'))).toBe('2025-01-15 10:04');
  });
});

describe('formatSpan', () => {
  const start = new Date('2025-01-15T10:00:00Z');
  const after = (seconds: number) => new Date(start.getTime() + seconds * 1000);

  it.each([
    { seconds: 0, expected: '0s' },
    { seconds: 45, expected: '45s' },
    { seconds: 60, expected: '1m' },
    { seconds: 59 * 60 + 59, expected: '59m' },
    { seconds: 3600, expected: '1h' },
    { seconds: 3600 + 23 * 60, expected: '1h 23m' },
    { seconds: 5 * 3600 + 30, expected: '5h' },
  ])('formats $seconds seconds as $expected', ({ seconds, expected }) => {
    expect(formatSpan(start, after(seconds))).toBe(expected);
  });

  it('never goes negative', () => {
    expect(formatSpan(after(60), start)).toBe('0s');
  });
});

describe('pluralize', () => {
  it('adds an s unless the count is one', () => {
    expect(pluralize(1, 'prompt')).toBe('1 prompt');
    expect(pluralize(0, 'prompt')).toBe('0 prompts');
    expect(pluralize(6, 'session')).toBe('6 sessions');
  });
});

describe('truncate', () => {
  it('shortens long text with an ellipsis', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });
});
