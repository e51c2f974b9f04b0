const OCTET = /^\d+$/;

/**
 * Dotted-quad IPv4 check: exactly four all-digit segments, each in [0,255].
 * Leading zeros are accepted ("192.168.01.1"). Routability is not checked.
 */
export function isValidIPv4(candidate: unknown): candidate is string {
    if (typeof candidate !== 'string') {
        return false;
    }

    const segments = candidate.split('.');
    if (segments.length !== 4) {
        return false;
    }

    return segments.every(segment => OCTET.test(segment) && Number.parseInt(segment, 10) <= 255);
}

/**
 * Keeps the valid entries, in input order, duplicates included.
 */
export function filterValidHosts(hosts: readonly unknown[]): string[] {
    return hosts.filter(isValidIPv4);
}
