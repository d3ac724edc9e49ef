import type { Turn, TurnRole } from '../../../../shared/types';

export interface RoleText {
  role: Exclude<TurnRole, 'system'>;
  text: string;
}

/** System turns, joined, for vendors that take the system prompt as a separate field. */
export function collectSystemText(conversation: readonly Turn[]): string | undefined {
  const parts = conversation.filter((turn) => turn.role === 'system').map((turn) => turn.text);
  return parts.length > 0 ? parts.join('\n\n') : undefined;
}

/**
 * Non-system turns with consecutive same-role turns merged.
 *
 * A failed dispatch leaves its user turn in place, so the next request can
 * carry two user turns in a row. Anthropic and Gemini expect the roles to
 * alternate.
 */
export function alternatingTurns(conversation: readonly Turn[]): RoleText[] {
  const merged: RoleText[] = [];
  for (const turn of conversation) {
    if (turn.role === 'system') continue;
    const last = merged[merged.length - 1];
    if (last && last.role === turn.role) {
      last.text = `${last.text}\n\n${turn.text}`;
    } else {
      merged.push({ role: turn.role, text: turn.text });
    }
  }
  return merged;
}
