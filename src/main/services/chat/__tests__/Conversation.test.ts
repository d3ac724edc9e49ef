import { describe, it, expect } from 'vitest';
import { Conversation, createTurn } from '../Conversation';
import { roleText } from '../../../../test-utils/fakes';

describe('Conversation', () => {
  it('creates frozen turns with an id and timestamp', () => {
    const turn = createTurn('user', 'Hello', new Date('2026-01-02T03:04:05.000Z'));

    expect(turn).toMatchObject({ role: 'user', text: 'Hello', timestamp: '2026-01-02T03:04:05.000Z' });
    expect(turn.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(turn)).toBe(true);
    expect(createTurn('user', 'Hello').id).not.toBe(turn.id);
  });

  it('appends in order', () => {
    const conversation = new Conversation();
    conversation.append(createTurn('user', 'Hello'));
    conversation.append(createTurn('assistant', 'Hi'));

    expect(conversation.length).toBe(2);
    expect(roleText(conversation.snapshot())).toEqual([
      { role: 'user', text: 'Hello' },
      { role: 'assistant', text: 'Hi' },
    ]);
  });

  it('hands out snapshots that later appends do not change', () => {
    const conversation = new Conversation([createTurn('user', 'Hello')]);
    const before = conversation.snapshot();

    conversation.append(createTurn('assistant', 'Hi'));

    expect(before).toHaveLength(1);
    expect(Object.isFrozen(before)).toBe(true);
    expect(conversation.snapshot()).toHaveLength(2);
  });

  it('clears and replaces the whole sequence', () => {
    const conversation = new Conversation([createTurn('user', 'Hello')]);

    conversation.clear();
    expect(conversation.length).toBe(0);

    conversation.replace([createTurn('user', 'a'), createTurn('assistant', 'b'), createTurn('user', 'c')]);
    expect(roleText(conversation.snapshot()).map((t) => t.text)).toEqual(['a', 'b', 'c']);
  });
});
