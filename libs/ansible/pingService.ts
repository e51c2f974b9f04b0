import type { AnsibleConfig } from '../bootstrap/config/ansible-config.js';
import { scopedLogger } from '../logging/logger.js';
import { assertPlaybookExists, buildCommand, renderCommand } from './command.js';
import { ExecutionError, HostValidationError, PingPipelineError } from './errors.js';
import { filterValidHosts } from './hostValidator.js';
import { buildInventory, withInventory, type InventoryOptions } from './inventory.js';
import { runCommand, type CommandRunner } from './processRunner.js';
import { parsePlayRecap } from './recapParser.js';
import type { CompletedOutcome, FailedOutcome, InvocationOutcome } from './types.js';

export interface PingResponse {
    statusCode: number;
    outcome: InvocationOutcome;
}

/**
 * Ping pipeline: validate hosts, pick an inventory, run the playbook once,
 * parse the recap, drop the temporary inventory.
 *
 * Pipeline failures come back as outcomes; only unexpected errors throw.
 */
export class AnsiblePingService {
    constructor(
        private readonly config: AnsibleConfig,
        private readonly runner: CommandRunner = runCommand,
        private readonly inventoryOptions: InventoryOptions = {}
    ) { }

    public async ping(requestedHosts?: readonly unknown[]): Promise<InvocationOutcome> {
        return (await this.execute(requestedHosts)).outcome;
    }

    public async execute(requestedHosts?: readonly unknown[]): Promise<PingResponse> {
        const log = scopedLogger();
        const customRequested = requestedHosts !== undefined && requestedHosts.length > 0;
        const candidates = customRequested ? requestedHosts : this.config.defaultHosts;
        const hosts = filterValidHosts(candidates);

        if (hosts.length < candidates.length) {
            log.warn({
                event: 'HOSTS_REJECTED',
                rejected: candidates.length - hosts.length,
                accepted: hosts.length
            }, 'Dropped hosts that are not IPv4 addresses');
        }

        let cmd: string | undefined;

        try {
            if (hosts.length === 0) {
                throw new HostValidationError();
            }

            await assertPlaybookExists(this.config.playbookPath);
            const inventory = await buildInventory(
                hosts,
                customRequested,
                this.config.staticInventoryPath,
                this.inventoryOptions
            );

            const outcome = await withInventory(inventory, async source => {
                const spec = buildCommand(source, this.config.playbookPath, this.config);
                const rendered = renderCommand(spec);
                cmd = rendered;

                log.info({ event: 'PLAYBOOK_STARTED', inventory: source.kind, hostCount: hosts.length, cmd: rendered });
                const result = await this.runner(spec, { timeoutSeconds: this.config.timeoutSeconds });
                const playSummary = parsePlayRecap(result.stdout);
                log.info({
                    event: 'PLAYBOOK_FINISHED',
                    exitCode: result.exitCode,
                    recapHosts: Object.keys(playSummary).length
                });

                const completed: CompletedOutcome = {
                    success: result.exitCode === 0,
                    returncode: result.exitCode,
                    stdout: result.stdout,
                    stderr: result.stderr,
                    cmd: rendered,
                    play_summary: playSummary
                };
                return completed;
            });

            return { statusCode: 200, outcome };
        } catch (err: unknown) {
            if (!(err instanceof PingPipelineError)) {
                throw err;
            }

            log.warn({ event: 'PING_FAILED', code: err.code, error: err.message });
            return { statusCode: err.statusCode, outcome: toFailedOutcome(err, cmd) };
        }
    }
}

function toFailedOutcome(err: PingPipelineError, cmd: string | undefined): FailedOutcome {
    const outcome: FailedOutcome = {
        success: false,
        error: err.message,
        error_kind: err.code
    };
    if (cmd !== undefined) {
        outcome.cmd = cmd;
    }
    if (err instanceof ExecutionError) {
        outcome.stdout = err.partialOutput.stdout;
        outcome.stderr = err.partialOutput.stderr;
    }
    return outcome;
}
