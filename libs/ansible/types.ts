/**
 * Shared shapes of the ping pipeline.
 */

export type InventorySource =
    | { readonly kind: 'static'; readonly path: string }
    | { readonly kind: 'ephemeral'; readonly path: string };

export interface CommandSpec {
    readonly binary: string;
    readonly args: readonly string[];
}

export interface ExecutionResult {
    readonly exitCode: number;
    readonly stdout: string;
    readonly stderr: string;
}

/** host -> counter name -> value, as printed in the PLAY RECAP block */
export type PlaySummary = Record<string, Record<string, number>>;

/**
 * The playbook ran to completion; success mirrors a zero exit code.
 */
export interface CompletedOutcome {
    success: boolean;
    returncode: number;
    stdout: string;
    stderr: string;
    cmd: string;
    play_summary: PlaySummary;
}

/**
 * Validation, setup or execution failed before a result was produced.
 */
export interface FailedOutcome {
    success: false;
    error: string;
    error_kind: string;
    cmd?: string;
    stdout?: string;
    stderr?: string;
}

export type InvocationOutcome = CompletedOutcome | FailedOutcome;

export function isCompletedOutcome(outcome: InvocationOutcome): outcome is CompletedOutcome {
    return 'returncode' in outcome;
}
