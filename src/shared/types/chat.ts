/**
 * Chat session types
 */

import type { ProviderName } from './ai';

export type TurnRole = 'user' | 'assistant' | 'system';

export interface Turn {
  readonly id: string;
  readonly role: TurnRole;
  readonly text: string;
  readonly timestamp: string;   // ISO string, as written to the session store
}

/** A conversation written to disk with /save */
export interface SavedChat {
  name: string;
  provider: ProviderName;
  model: string;
  turns: Turn[];
  createdAt: string;
  updatedAt: string;
}
