/**
 * Unit Tests: Host Validator
 *
 * @see libs/ansible/hostValidator.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { filterValidHosts, isValidIPv4 } from '../../libs/ansible/hostValidator.js';

describe('isValidIPv4', () => {
    it('should accept dotted quads with octets in range', () => {
        for (const host of ['192.168.1.1', '0.0.0.0', '255.255.255.255', '10.0.0.1', '127.0.0.1']) {
            assert.strictEqual(isValidIPv4(host), true, host);
        }
    });

    it('should accept leading zeros in octets', () => {
        assert.strictEqual(isValidIPv4('192.168.01.1'), true);
        assert.strictEqual(isValidIPv4('010.000.000.001'), true);
    });

    it('should reject out-of-range octets', () => {
        assert.strictEqual(isValidIPv4('999.1.1.1'), false);
        assert.strictEqual(isValidIPv4('1.1.1.256'), false);
    });

    it('should reject wrong segment counts', () => {
        assert.strictEqual(isValidIPv4('1.2.3'), false);
        assert.strictEqual(isValidIPv4('1.2.3.4.5'), false);
        assert.strictEqual(isValidIPv4(''), false);
    });

    it('should reject non-numeric and decorated segments', () => {
        for (const host of ['abc.1.1.1', '1..1.1', '+1.1.1.1', '-1.1.1.1', ' 1.1.1.1', '1.1.1.1 ', '1.1.1.0x1', '1e2.1.1.1']) {
            assert.strictEqual(isValidIPv4(host), false, JSON.stringify(host));
        }
    });

    it('should reject shell metacharacters', () => {
        assert.strictEqual(isValidIPv4('; rm -rf /'), false);
        assert.strictEqual(isValidIPv4('10.0.0.1; rm -rf /'), false);
        assert.strictEqual(isValidIPv4('10.0.0.1 --become'), false);
    });

    it('should return false for non-string input without throwing', () => {
        for (const value of [undefined, null, 42, {}, ['1.1.1.1']]) {
            assert.strictEqual(isValidIPv4(value), false);
        }
    });
});

describe('filterValidHosts', () => {
    it('should keep the valid subset in input order', () => {
        assert.deepStrictEqual(
            filterValidHosts(['10.0.0.1', 'bad', '10.0.0.2']),
            ['10.0.0.1', '10.0.0.2']
        );
    });

    it('should keep duplicates', () => {
        assert.deepStrictEqual(
            filterValidHosts(['10.0.0.1', '10.0.0.1', 7, '10.0.0.3']),
            ['10.0.0.1', '10.0.0.1', '10.0.0.3']
        );
    });

    it('should return an empty list when nothing is valid', () => {
        assert.deepStrictEqual(filterValidHosts(['; rm -rf /', 'localhost']), []);
    });
});
