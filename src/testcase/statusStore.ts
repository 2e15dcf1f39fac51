/**
 * @fileoverview Status Store
 *
 * Persists each test case's {@link TestRecord} as a JSON file inside its work
 * directory. The transcript and the phase statuses live in the same file
 * because the report needs both together.
 *
 * Reads and writes are fail-soft: a missing, corrupt or unwritable file only
 * costs redundant re-execution and never aborts a run.
 *
 * @module testcase/statusStore
 */

import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import type { IFileSystem } from '../interfaces/IFileSystem';
import type { IStatusStore } from '../interfaces/IStatusStore';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { createFreshRecord, PHASE_STATUSES, PhaseStatus, TestRecord } from './types';

const log = Logger.for('status-store');

/** Format version written into every status file. */
export const STATUS_FILE_VERSION = 1;

/**
 * On-disk layout of a status file.
 */
export interface SerializedRecord {
  version: number;
  log: string;
  status: {
    prepare: PhaseStatus;
    run: PhaseStatus;
    check: PhaseStatus;
  };
}

const phaseStatusSchema = {
  type: 'string',
  enum: [...PHASE_STATUSES],
} as const;

const serializedRecordSchema: JSONSchemaType<SerializedRecord> = {
  type: 'object',
  properties: {
    version: { type: 'integer', const: STATUS_FILE_VERSION },
    log: { type: 'string' },
    status: {
      type: 'object',
      properties: {
        prepare: phaseStatusSchema,
        run: phaseStatusSchema,
        check: phaseStatusSchema,
      },
      required: ['prepare', 'run', 'check'],
      additionalProperties: false,
    },
  },
  required: ['version', 'log', 'status'],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, strict: true });
const validateRecord = ajv.compile(serializedRecordSchema);

/**
 * JSON-file backed {@link IStatusStore}.
 *
 * @example
 * ```typescript
 * const store = new JsonStatusStore(new DefaultFileSystem());
 * const record = store.load('/work/scf/h2o/.valrun-status.json');
 * record.status.prepare = 'ok';
 * store.save('/work/scf/h2o/.valrun-status.json', record);
 * ```
 */
export class JsonStatusStore implements IStatusStore {
  constructor(private readonly fileSystem: IFileSystem) {}

  load(filePath: string): TestRecord {
    let content: string;
    try {
      content = this.fileSystem.readFileSync(filePath);
    } catch (error) {
      log.debug(`No status at ${filePath}, starting fresh`, { reason: errorMessage(error) });
      return createFreshRecord();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      log.debug(`Unparsable status at ${filePath}, starting fresh`, { reason: errorMessage(error) });
      return createFreshRecord();
    }

    if (!validateRecord(parsed)) {
      log.debug(`Invalid status at ${filePath}, starting fresh`, { errors: ajv.errorsText(validateRecord.errors) });
      return createFreshRecord();
    }

    return {
      status: { prepare: parsed.status.prepare, run: parsed.status.run, check: parsed.status.check },
      log: parsed.log,
    };
  }

  save(filePath: string, record: TestRecord): void {
    const serialized: SerializedRecord = {
      version: STATUS_FILE_VERSION,
      log: record.log,
      status: { ...record.status },
    };
    try {
      this.fileSystem.ensureDir(path.dirname(filePath));
      this.fileSystem.writeFileSync(filePath, JSON.stringify(serialized, null, 2));
      log.debug(`Saved status to ${filePath}`, serialized.status);
    } catch (error) {
      log.warn(`Failed to save status to ${filePath}`, { error: errorMessage(error) });
    }
  }
}
