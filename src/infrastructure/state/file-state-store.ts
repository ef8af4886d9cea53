/**
 * File-backed state store: one JSON record per resource id.
 *
 * Writes go to a uniquely named temp file that is renamed over the record, so
 * a reader sees either the old record or the new one. Concurrent writes to
 * distinct ids touch distinct files.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { StateStoreError, errorMessage } from '../../errors';
import type { StateStore } from '../../domain/types/interfaces';
import type { ServiceState } from '../../domain/types/service';
import { ServiceStateSchema } from '../../domain/validators';

const RECORD_SUFFIX = '.json';
const RESOURCE_ID_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * fs errors raised under another realm (Jest's sandbox) fail `instanceof Error`
 */
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  private readonly logger: Logger;

  constructor(
    private readonly dir: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'FileStateStore' });
  }

  private recordPath(resourceId: string): string {
    if (!RESOURCE_ID_PATTERN.test(resourceId)) {
      throw new StateStoreError(`Invalid resource id: ${resourceId}`, { resourceId });
    }
    return join(this.dir, `${resourceId}${RECORD_SUFFIX}`);
  }

  async read(resourceId: string): Promise<ServiceState | undefined> {
    const path = this.recordPath(resourceId);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new StateStoreError(`Cannot read state for ${resourceId}: ${errorMessage(error)}`, {
        resourceId,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StateStoreError(`Corrupt state record for ${resourceId}: ${errorMessage(error)}`, {
        resourceId,
      });
    }

    const parsed = ServiceStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateStoreError(`Invalid state record for ${resourceId}: ${parsed.error.message}`, {
        resourceId,
      });
    }

    const state: ServiceState = parsed.data;
    return state;
  }

  async write(resourceId: string, state: ServiceState): Promise<void> {
    const path = this.recordPath(resourceId);
    const temp = `${path}.${nanoid(8)}.tmp`;

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(temp, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
      await rename(temp, path);
    } catch (error) {
      await rm(temp, { force: true });
      throw new StateStoreError(`Cannot write state for ${resourceId}: ${errorMessage(error)}`, {
        resourceId,
      });
    }

    this.logger.debug({ resourceId, revision: state.revisionId }, 'State written');
  }

  async remove(resourceId: string): Promise<void> {
    const path = this.recordPath(resourceId);
    try {
      await rm(path, { force: true });
    } catch (error) {
      throw new StateStoreError(`Cannot remove state for ${resourceId}: ${errorMessage(error)}`, {
        resourceId,
      });
    }
    this.logger.debug({ resourceId }, 'State removed');
  }

  async list(): Promise<Array<{ resourceId: string; state: ServiceState }>> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StateStoreError(`Cannot list state directory: ${errorMessage(error)}`);
    }

    const records: Array<{ resourceId: string; state: ServiceState }> = [];
    for (const name of names.filter((n) => n.endsWith(RECORD_SUFFIX)).sort()) {
      const resourceId = name.slice(0, -RECORD_SUFFIX.length);
      const state = await this.read(resourceId);
      if (state) {
        records.push({ resourceId, state });
      }
    }
    return records;
  }
}
