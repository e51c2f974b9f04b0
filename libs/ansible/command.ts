import type { AnsibleConfig } from '../bootstrap/config/ansible-config.js';
import { NotFoundError } from './errors.js';
import { fileExists } from './inventory.js';
import type { CommandSpec, InventorySource } from './types.js';

type CommandSettings = Pick<AnsibleConfig, 'binary' | 'remoteUser' | 'privateKeyPath' | 'sshExtraArgs'>;

export async function assertPlaybookExists(playbookPath: string): Promise<void> {
    if (!(await fileExists(playbookPath))) {
        throw new NotFoundError('playbook', playbookPath);
    }
}

/**
 * Fixed-shape ansible-playbook invocation. Only the inventory path varies
 * per request; binary, user, key and SSH options come from config.
 */
export function buildCommand(
    inventory: InventorySource,
    playbookPath: string,
    config: CommandSettings
): CommandSpec {
    return Object.freeze({
        binary: config.binary,
        args: Object.freeze([
            '-i', inventory.path,
            playbookPath,
            '--user', config.remoteUser,
            '--private-key', config.privateKeyPath,
            '--ssh-extra-args', config.sshExtraArgs
        ])
    });
}

/**
 * Space-joined form reported back to callers. Display only: the runner
 * never hands this string to a shell.
 */
export function renderCommand(spec: CommandSpec): string {
    return [spec.binary, ...spec.args].join(' ');
}
