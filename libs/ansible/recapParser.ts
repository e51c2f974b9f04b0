import stripAnsi from 'strip-ansi';
import type { PlaySummary } from './types.js';

const MARKER = 'PLAY RECAP';
const SEPARATOR_LINE = /^[*=#~\-_+]+$/;
const COUNTER = /([A-Za-z_]\w*)=(\d+)/g;

/**
 * Extracts the per-host counters from ansible-playbook's PLAY RECAP block.
 *
 * Best-effort against console output: the block starts at the first line
 * beginning with the marker and ends at the first blank line. Counter names
 * are not fixed; any name=integer token is kept. Returns {} when there is
 * no recap.
 */
export function parsePlayRecap(stdout: string): PlaySummary {
    if (!stdout) {
        return {};
    }

    const lines = stripAnsi(stdout).split(/\r?\n/);
    const markerIndex = lines.findIndex(line => line.trimStart().startsWith(MARKER));
    if (markerIndex === -1) {
        return {};
    }

    let index = markerIndex + 1;
    // separator may sit on its own line under the marker
    if (index < lines.length && SEPARATOR_LINE.test(lines[index].trim())) {
        index++;
    }

    // entries, not assignment: a host or counter named __proto__ stays an own key
    const hosts: [string, Record<string, number>][] = [];

    for (; index < lines.length; index++) {
        const line = lines[index];
        if (line.trim() === '') {
            break;
        }

        const colon = line.indexOf(':');
        if (colon === -1) {
            continue;
        }

        const host = line.slice(0, colon).trim();
        if (host === '') {
            continue;
        }

        const counters = Array.from(
            line.slice(colon + 1).matchAll(COUNTER),
            (match): [string, number] => [match[1], Number.parseInt(match[2], 10)]
        );
        hosts.push([host, Object.fromEntries(counters)]);
    }

    return Object.fromEntries(hosts);
}
