import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { UserPrefs } from '../domain/models.js';
import { userPrefsSchema } from '../domain/models.js';

export type SignalHandler = (signal: unknown) => Promise<void>;

/** Delivers graded signals at least once. */
export interface SignalSource {
  subscribe(handler: SignalHandler): () => void;
}

/** Lists the users that currently have trading enabled, with their preferences. */
export interface UserDirectory {
  getTradingUsers(): Promise<UserPrefs[]>;
}

/** Signals pushed by code in the same process, e.g. an analytics poller or tests. */
export class InMemorySignalSource implements SignalSource {
  private readonly handlers = new Set<SignalHandler>();

  subscribe(handler: SignalHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Resolves once every subscriber has handled the signal. */
  async publish(signal: unknown): Promise<void> {
    await Promise.all([...this.handlers].map((handler) => handler(signal)));
  }

  subscriberCount(): number {
    return this.handlers.size;
  }
}

export class StaticUserDirectory implements UserDirectory {
  private readonly users: UserPrefs[];

  constructor(users: unknown[]) {
    this.users = z.array(userPrefsSchema).parse(users);
  }

  async getTradingUsers(): Promise<UserPrefs[]> {
    return this.users.filter((user) => user.tradingEnabled);
  }
}

/** Reads a JSON array of user preferences on every call, so edits apply without a restart. */
export class JsonFileUserDirectory implements UserDirectory {
  constructor(private readonly path: string) {}

  async getTradingUsers(): Promise<UserPrefs[]> {
    const raw: unknown = JSON.parse(await readFile(this.path, 'utf8'));
    const parsed = z.array(userPrefsSchema).safeParse(raw);

    if (!parsed.success) {
      throw new Error(`Invalid user preferences in ${this.path}: ${parsed.error.message}`);
    }

    return parsed.data.filter((user) => user.tradingEnabled);
  }
}
