import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import type { DelegationConfig } from '../types/delegation.js';
import { ConfigurationError } from '../types/delegation-errors.js';
import { parseDelegationConfig } from './delegation-config-schema.js';

const DEFAULT_CONFIG_FILE = 'delegation.json';

export function getDelegationConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.SUBTASK_CONFIG_PATH) {
        return path.resolve(process.env.SUBTASK_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

/** Reads and validates a delegation config. A missing file yields the defaults. */
export async function readDelegationConfig(overridePath?: string): Promise<DelegationConfig> {
    const targetPath = getDelegationConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return parseDelegationConfig({});
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Failed to read delegation config at ${targetPath}: ${message}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Failed to parse delegation config at ${targetPath}: ${message}`);
    }
    return parseDelegationConfig(parsed);
}

/** Writes through a temp file and a rename so readers never see a partial file. */
export async function writeDelegationConfig(config: DelegationConfig, overridePath?: string): Promise<void> {
    const targetPath = getDelegationConfigPath(overridePath);
    const dir = path.dirname(targetPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }

    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Failed to save delegation config to ${targetPath}: ${message}`);
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
