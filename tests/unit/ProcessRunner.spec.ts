/**
 * Unit Tests: Process Runner
 *
 * The current node binary stands in for ansible-playbook.
 *
 * @see libs/ansible/processRunner.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { runCommand } from '../../libs/ansible/processRunner.js';
import { ExecutionError } from '../../libs/ansible/errors.js';

function nodeScript(source: string) {
    return { binary: process.execPath, args: ['-e', source] };
}

describe('runCommand', () => {
    it('should capture stdout, stderr and a zero exit code', async () => {
        const result = await runCommand(
            nodeScript('process.stdout.write("hello\\n"); process.stderr.write("warn\\n");'),
            { timeoutSeconds: 30 }
        );

        assert.deepStrictEqual(result, { exitCode: 0, stdout: 'hello\n', stderr: 'warn\n' });
    });

    it('should resolve, not reject, on a non-zero exit code', async () => {
        const result = await runCommand(
            nodeScript('process.stdout.write("partial"); process.exit(4);'),
            { timeoutSeconds: 30 }
        );

        assert.strictEqual(result.exitCode, 4);
        assert.strictEqual(result.stdout, 'partial');
    });

    it('should disable ansible colour output in the child environment', async () => {
        const result = await runCommand(
            nodeScript('process.stdout.write(`${process.env.ANSIBLE_NOCOLOR}/${process.env.ANSIBLE_FORCE_COLOR}`);'),
            { timeoutSeconds: 30 }
        );

        assert.strictEqual(result.stdout, '1/0');
    });

    it('should pass extra environment through', async () => {
        const result = await runCommand(
            nodeScript('process.stdout.write(process.env.PING_TEST_MARKER ?? "");'),
            { timeoutSeconds: 30, env: { PING_TEST_MARKER: 'marker' } }
        );

        assert.strictEqual(result.stdout, 'marker');
    });

    it('should not interpret arguments through a shell', async () => {
        const result = await runCommand(
            { binary: process.execPath, args: ['-e', 'process.stdout.write(process.argv[1])', '$(echo injected); true'] },
            { timeoutSeconds: 30 }
        );

        assert.strictEqual(result.stdout, '$(echo injected); true');
    });

    it('should classify a missing binary as BINARY_MISSING', async () => {
        await assert.rejects(
            () => runCommand({ binary: 'ansible-playbook-does-not-exist-test', args: [] }, { timeoutSeconds: 30 }),
            (err: unknown) => {
                assert.ok(err instanceof ExecutionError);
                assert.strictEqual(err.kind, 'BINARY_MISSING');
                assert.strictEqual(err.statusCode, 502);
                return true;
            }
        );
    });

    it('should kill the child and classify TIMEOUT', { timeout: 20000 }, async () => {
        const started = Date.now();

        await assert.rejects(
            () => runCommand(
                nodeScript('process.stdout.write("started\\n"); setInterval(() => {}, 1000);'),
                { timeoutSeconds: 0.5, killGraceMs: 500 }
            ),
            (err: unknown) => {
                assert.ok(err instanceof ExecutionError);
                assert.strictEqual(err.kind, 'TIMEOUT');
                assert.strictEqual(err.statusCode, 504);
                return true;
            }
        );

        assert.ok(Date.now() - started < 10000);
    });

    it('should escalate to SIGKILL when SIGTERM is ignored', { timeout: 20000 }, async () => {
        await assert.rejects(
            () => runCommand(
                nodeScript('process.on("SIGTERM", () => {}); setInterval(() => {}, 1000);'),
                { timeoutSeconds: 0.5, killGraceMs: 200 }
            ),
            (err: unknown) => err instanceof ExecutionError && err.kind === 'TIMEOUT'
        );
    });

    it('should time out when the child exits but a grandchild keeps the pipes open', { timeout: 20000 }, async () => {
        const started = Date.now();
        const script = [
            'const { spawn } = require("child_process");',
            'spawn(process.execPath, ["-e", "setTimeout(() => {}, 4000)"], { detached: true, stdio: "inherit" }).unref();',
            'process.exit(0);'
        ].join(' ');

        await assert.rejects(
            () => runCommand(nodeScript(script), { timeoutSeconds: 1, killGraceMs: 200 }),
            (err: unknown) => {
                assert.ok(err instanceof ExecutionError);
                assert.strictEqual(err.kind, 'TIMEOUT');
                return true;
            }
        );

        assert.ok(Date.now() - started < 3000, `settled after ${Date.now() - started}ms`);
    });

    describe('with a binary that is not executable', () => {
        let tempDir: string;
        let binary: string;

        before(() => {
            tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-test-'));
            binary = path.join(tempDir, 'ansible-playbook');
            fs.writeFileSync(binary, '#!/bin/sh\necho never\n', { mode: 0o644 });
        });

        after(() => {
            fs.rmSync(tempDir, { recursive: true, force: true });
        });

        it('should classify the spawn failure as BINARY_MISSING', async () => {
            await assert.rejects(
                () => runCommand({ binary, args: [] }, { timeoutSeconds: 30 }),
                (err: unknown) => {
                    assert.ok(err instanceof ExecutionError);
                    assert.strictEqual(err.kind, 'BINARY_MISSING');
                    assert.strictEqual(err.message, `${binary} is not executable`);
                    return true;
                }
            );
        });
    });
});
