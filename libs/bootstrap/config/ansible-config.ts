import path from 'path';
import { z } from 'zod';
import type { GuardRule } from '../config-guard.js';
import { validate } from '../../validation/zod-middleware.js';

// Shipped playbook and inventory, relative to the working directory
const PLAYBOOK_DIR = path.join(process.cwd(), 'ansible');

export const DEFAULT_SSH_EXTRA_ARGS = '-o StrictHostKeyChecking=no -o UserKnownHostsFile=/dev/null';
export const DEFAULT_TIMEOUT_SECONDS = 120;
// setTimeout caps delays at 2^31-1 ms
export const MAX_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

/**
 * Process-wide settings of the ping pipeline. Passed explicitly into the
 * command builder and the service; request data never reaches these.
 */
export interface AnsibleConfig {
    readonly binary: string;
    readonly playbookPath: string;
    readonly staticInventoryPath: string;
    readonly remoteUser: string;
    readonly privateKeyPath: string;
    readonly sshExtraArgs: string;
    readonly defaultHosts: readonly string[];
    readonly timeoutSeconds: number;
}

export interface ServerConfig {
    readonly port: number;
}

const commaList = z.string().transform(value =>
    value.split(',').map(item => item.trim()).filter(item => item !== '')
);

const EnvSchema = z.object({
    ANSIBLE_PLAYBOOK_BIN: z.string().min(1).default('ansible-playbook'),
    ANSIBLE_PLAYBOOK_PATH: z.string().min(1).default(path.join(PLAYBOOK_DIR, 'ping.yml')),
    ANSIBLE_INVENTORY_PATH: z.string().min(1).default(path.join(PLAYBOOK_DIR, 'inventory.ini')),
    ANSIBLE_REMOTE_USER: z.string().min(1).default('ec2-user'),
    ANSIBLE_PRIVATE_KEY: z.string().min(1).default('/etc/platform-api/ssh/id_rsa'),
    ANSIBLE_SSH_EXTRA_ARGS: z.string().min(1).default(DEFAULT_SSH_EXTRA_ARGS),
    ANSIBLE_DEFAULT_HOSTS: commaList.default('192.0.2.10,192.0.2.11'),
    ANSIBLE_TIMEOUT_SECONDS: z.coerce.number().int().positive().max(MAX_TIMEOUT_SECONDS).default(DEFAULT_TIMEOUT_SECONDS),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000)
});

/**
 * Startup guards for the playbook runner.
 */
export const ANSIBLE_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'assert',
        check: () => process.env.NODE_ENV !== 'production' || !!process.env.ANSIBLE_PRIVATE_KEY,
        message: 'ANSIBLE_PRIVATE_KEY must be explicitly set in production'
    },
    {
        type: 'assert',
        check: () => {
            const raw = process.env.ANSIBLE_TIMEOUT_SECONDS;
            if (raw === undefined) return true;
            return /^[1-9]\d*$/.test(raw.trim()) && Number(raw.trim()) <= MAX_TIMEOUT_SECONDS;
        },
        message: `ANSIBLE_TIMEOUT_SECONDS must be a positive integer no greater than ${MAX_TIMEOUT_SECONDS}`
    }
];

export function loadAnsibleConfig(env: NodeJS.ProcessEnv = process.env): AnsibleConfig {
    const parsed = validate(EnvSchema, env, 'Config:Ansible');

    return Object.freeze({
        binary: parsed.ANSIBLE_PLAYBOOK_BIN,
        playbookPath: parsed.ANSIBLE_PLAYBOOK_PATH,
        staticInventoryPath: parsed.ANSIBLE_INVENTORY_PATH,
        remoteUser: parsed.ANSIBLE_REMOTE_USER,
        privateKeyPath: parsed.ANSIBLE_PRIVATE_KEY,
        sshExtraArgs: parsed.ANSIBLE_SSH_EXTRA_ARGS,
        defaultHosts: Object.freeze([...parsed.ANSIBLE_DEFAULT_HOSTS]),
        timeoutSeconds: parsed.ANSIBLE_TIMEOUT_SECONDS
    });
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    return { port: validate(EnvSchema, env, 'Config:Server').PORT };
}
