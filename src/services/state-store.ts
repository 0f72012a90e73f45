import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { PollState } from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';

const STATE_FILE_VERSION = 1;

const priceRecordSchema = z.object({
  value: z.number().finite(),
  cycle: z.number().int().nonnegative(),
  observedAt: z.string().datetime(),
});

const stateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  savedAt: z.string(),
  state: z.object({
    lastRecord: priceRecordSchema.nullable(),
    lastPayloadHash: z.string().nullable(),
    cacheToken: z
      .object({
        etag: z.string().nullable(),
        lastModified: z.string().nullable(),
      })
      .nullable(),
  }),
});

export type SaveResult = { status: 'ok' } | { status: 'failed'; reason: string };

export function emptyPollState(): PollState {
  return { lastRecord: null, lastPayloadHash: null, cacheToken: null };
}

export class StateStore {
  private filePath: string;
  private logger: Logger;

  constructor(filePath: string, logger: Logger = createLogger('Store')) {
    this.filePath = filePath;
    this.logger = logger;
  }

  load(): PollState {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (StateStore.isNotFound(error)) {
        this.logger.info(`No state file at ${this.filePath}, starting fresh`);
      } else {
        this.logger.error(`Could not read ${this.filePath}, starting fresh:`, error);
      }
      return emptyPollState();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.error(`State file ${this.filePath} is not valid JSON, starting fresh:`, error);
      return emptyPollState();
    }

    const parsed = stateFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.error(`State file ${this.filePath} has an unexpected shape, starting fresh: ${parsed.error.message}`);
      return emptyPollState();
    }

    const { state } = parsed.data;
    if (state.lastRecord) {
      this.logger.info(`Loaded last price ${state.lastRecord.value} (cycle ${state.lastRecord.cycle})`);
    }
    return {
      lastRecord: state.lastRecord ? Object.freeze({ ...state.lastRecord }) : null,
      lastPayloadHash: state.lastPayloadHash,
      cacheToken: state.cacheToken,
    };
  }

  save(state: PollState): SaveResult {
    const body = JSON.stringify(
      { version: STATE_FILE_VERSION, savedAt: new Date().toISOString(), state },
      null,
      2
    );
    const tmpPath = `${this.filePath}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, body, 'utf8');
      fs.renameSync(tmpPath, this.filePath);
      this.logger.debug(`Saved state to ${this.filePath}`);
      return { status: 'ok' };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { status: 'failed', reason: `WriteFailed: ${reason}` };
    }
  }

  private static isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
  }
}
