import { describe, it, expect } from 'vitest';
import { parseCommand, USAGE } from './app';

describe('parseCommand', () => {
  it('defaults to run-once', () => {
    expect(parseCommand([])).toBe('run-once');
    expect(parseCommand(['run-once'])).toBe('run-once');
  });

  it('rejects unknown commands and extra arguments', () => {
    expect(parseCommand(['run'])).toBeNull();
    expect(parseCommand(['run-once', '--verbose'])).toBeNull();
  });

  it('names the npm script in the usage line', () => {
    expect(USAGE).toBe('Usage: npm run run-once');
  });
});
