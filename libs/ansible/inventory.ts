import crypto from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { logger } from '../logging/logger.js';
import { InventoryIOError, NotFoundError } from './errors.js';
import type { InventorySource } from './types.js';

export interface InventoryOptions {
    /** Directory for request-scoped inventories (default: os.tmpdir()) */
    tmpDir?: string;
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(filePath);
        return stat.isFile();
    } catch (err: unknown) {
        if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
            return false;
        }
        throw err;
    }
}

/**
 * Chooses the inventory for one invocation.
 *
 * Explicit hosts get a fresh file, one address per line in input order;
 * otherwise the static inventory is used and must exist.
 */
export async function buildInventory(
    hosts: readonly string[],
    customRequested: boolean,
    staticPath: string,
    options: InventoryOptions = {}
): Promise<InventorySource> {
    if (!customRequested) {
        if (!(await fileExists(staticPath))) {
            throw new NotFoundError('inventory', staticPath);
        }
        return { kind: 'static', path: staticPath };
    }

    const dir = options.tmpDir ?? os.tmpdir();
    const filePath = path.join(dir, `inventory-${crypto.randomUUID()}.ini`);
    const content = hosts.map(host => `${host}\n`).join('');

    try {
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx', mode: 0o600 });
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        throw new InventoryIOError(`Could not create temporary inventory: ${message}`, { cause: err });
    }

    logger.debug({ event: 'INVENTORY_CREATED', path: filePath, hostCount: hosts.length });
    return { kind: 'ephemeral', path: filePath };
}

/**
 * Runs fn with the inventory and removes an ephemeral file afterwards,
 * whatever fn does. Removal failures are logged, never rethrown.
 */
export async function withInventory<T>(
    source: InventorySource,
    fn: (source: InventorySource) => Promise<T>
): Promise<T> {
    try {
        return await fn(source);
    } finally {
        if (source.kind === 'ephemeral') {
            await releaseInventory(source.path);
        }
    }
}

async function releaseInventory(filePath: string): Promise<void> {
    try {
        await fs.unlink(filePath);
        logger.debug({ event: 'INVENTORY_REMOVED', path: filePath });
    } catch (err: unknown) {
        logger.warn({
            event: 'INVENTORY_CLEANUP_FAILED',
            path: filePath,
            error: err instanceof Error ? err.message : String(err)
        }, 'Temporary inventory cleanup failed');
    }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
