import { describe, expect, it } from 'vitest';
import { SessionMemory } from '../../../src/services/sessionMemory.js';

const fixedNow = () => new Date('2026-05-01T12:00:00.000Z');

describe('SessionMemory', () => {
  it('keeps only the newest messages per session', () => {
    const memory = new SessionMemory({ maxMessages: 2, now: fixedNow });
    memory.append('s1', 'user', 'one');
    memory.append('s1', 'assistant', 'two');
    const history = memory.append('s1', 'user', 'three');

    expect(history).toEqual([
      { role: 'assistant', content: 'two', at: '2026-05-01T12:00:00.000Z' },
      { role: 'user', content: 'three', at: '2026-05-01T12:00:00.000Z' },
    ]);
    expect(memory.history('s1')).toEqual(history);
  });

  it('keeps sessions apart and returns an empty history for unknown ones', () => {
    const memory = new SessionMemory({ maxMessages: 5 });
    memory.append('a', 'user', 'hello');
    expect(memory.history('b')).toEqual([]);
    expect(memory.history('a').map((m) => m.content)).toEqual(['hello']);
  });

  it('evicts the least recently touched session', () => {
    const memory = new SessionMemory({ maxMessages: 5, maxSessions: 2 });
    memory.append('a', 'user', '1');
    memory.append('b', 'user', '2');
    memory.history('a');
    memory.append('c', 'user', '3');

    expect(memory.size()).toBe(2);
    expect(memory.history('b')).toEqual([]);
    expect(memory.history('a')).toHaveLength(1);
  });

  it('clears a session', () => {
    const memory = new SessionMemory({ maxMessages: 5 });
    memory.append('a', 'system', 'be brief');
    expect(memory.clear('a')).toBe(true);
    expect(memory.clear('a')).toBe(false);
    expect(memory.size()).toBe(0);
  });
});
