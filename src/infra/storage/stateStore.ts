import fs from 'node:fs/promises';
import path from 'node:path';
import { LedgerState } from '../../types.js';
import { decodeJson, encodeJson } from './bigintCodec.js';
import { ledgerStateSchema } from './stateSchema.js';

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export const normalizeState = (raw: unknown): LedgerState => ledgerStateSchema.parse(raw);

/**
 * Holds the ledger state. Every write runs against a draft clone and is
 * committed only when the work returns, so a throwing operation leaves no
 * trace. Without a file path the state lives in memory only.
 */
export class StateStore {
  private state: LedgerState;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly seed: () => LedgerState,
    private readonly stateFilePath?: string,
  ) {
    this.state = seed();
  }

  async init(): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.stateFilePath, 'utf-8');
      this.state = normalizeState(decodeJson(raw));
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = this.seed();
      await this.persist(this.state);
    }
  }

  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  async transaction<T>(work: (draft: LedgerState) => T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = work(draft);
      await this.persist(draft);
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private async persist(state: LedgerState): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.writeFile(this.stateFilePath, encodeJson(state));
  }
}
