/**
 * Tests for argument validators.
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { SearchModifier } from '../types/index.js';
import {
  expandIPv6,
  requireDomainName,
  requireIPAddress,
  requireIPv4,
  requireIPv6,
  requirePositiveInt,
  requireSearchName,
  requireText,
  reverseMapName,
} from '../validation/index.js';

describe('requireIPv4', () => {
  it('should accept a dotted quad', () => {
    expect(requireIPv4('10.0.0.5')).toBe('10.0.0.5');
  });

  it('should reject an out of range octet', () => {
    expect(() => requireIPv4('300.1.1.1')).toThrow(
      "IPv4 address '300.1.1.1' is invalid: not a valid IPv4 address"
    );
  });

  it('should reject an IPv6 literal', () => {
    expect(() => requireIPv4('2001:db8::1')).toThrow(ValidationError);
  });
});

describe('requireIPv6', () => {
  it('should accept compressed forms', () => {
    expect(requireIPv6('2001:db8::1')).toBe('2001:db8::1');
    expect(requireIPv6('::1')).toBe('::1');
  });

  it('should reject an IPv4 literal', () => {
    expect(() => requireIPv6('10.0.0.5')).toThrow(ValidationError);
  });
});

describe('requireIPAddress', () => {
  it('should accept both families', () => {
    expect(requireIPAddress('10.0.0.5')).toBe('10.0.0.5');
    expect(requireIPAddress('2001:db8::5')).toBe('2001:db8::5');
  });

  it('should reject anything else', () => {
    expect(() => requireIPAddress('host.example.com')).toThrow(
      "IP address 'host.example.com' is not a valid IPv4 or IPv6 address"
    );
  });
});

describe('requireDomainName', () => {
  it.each(['host.example.com', 'example.com.', '*.example.com', '_dmarc.example.com', 'localhost'])(
    'should accept %s',
    (name) => {
      expect(requireDomainName(name)).toBe(name);
    }
  );

  it.each(['bad..example.com', '-bad.example.com', 'bad-.example.com', 'sp ace.example.com', ''])(
    'should reject %j',
    (name) => {
      expect(() => requireDomainName(name)).toThrow(ValidationError);
    }
  );

  it('should reject a label longer than 63 characters', () => {
    expect(() => requireDomainName(`${'a'.repeat(64)}.example.com`)).toThrow(ValidationError);
  });

  it('should reject a name longer than 253 characters', () => {
    const name = Array.from({ length: 5 }, () => 'a'.repeat(60)).join('.');
    expect(() => requireDomainName(name)).toThrow('longer than 253 characters');
  });

  it('should use the given field name', () => {
    expect(() => requireDomainName('bad..name', 'Alias name')).toThrow(
      "Alias name 'bad..name' is invalid: contains an invalid label"
    );
  });
});

describe('requireSearchName', () => {
  it('should accept a pattern for regex searches', () => {
    expect(requireSearchName('^host[0-9]+\\.example', SearchModifier.Regex)).toBe(
      '^host[0-9]+\\.example'
    );
  });

  it('should require a domain name otherwise', () => {
    expect(() => requireSearchName('^host[0-9]+', SearchModifier.CaseInsensitive)).toThrow(
      ValidationError
    );
  });
});

describe('requireText and requirePositiveInt', () => {
  it('should reject empty text', () => {
    expect(() => requireText('', 'Text')).toThrow("Text '' is invalid: must not be empty");
  });

  it('should reject zero and fractions', () => {
    expect(() => requirePositiveInt(0, 'Page size')).toThrow(ValidationError);
    expect(() => requirePositiveInt(1.5, 'Page size')).toThrow(ValidationError);
    expect(requirePositiveInt(100, 'Page size')).toBe(100);
  });
});

describe('expandIPv6', () => {
  it('should fill a compressed run with zeros', () => {
    expect(expandIPv6('2001:db8::1')).toEqual([0x2001, 0xdb8, 0, 0, 0, 0, 0, 1]);
  });

  it('should handle a trailing compressed run', () => {
    expect(expandIPv6('fe80::')).toEqual([0xfe80, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('should convert an embedded IPv4 tail', () => {
    expect(expandIPv6('::ffff:10.0.0.1')).toEqual([0, 0, 0, 0, 0, 0xffff, 0xa00, 1]);
  });
});

describe('reverseMapName', () => {
  it('should reverse IPv4 octets under in-addr.arpa', () => {
    expect(reverseMapName('10.0.0.5')).toBe('5.0.0.10.in-addr.arpa');
  });

  it('should reverse IPv6 nibbles under ip6.arpa', () => {
    expect(reverseMapName('2001:db8::1')).toBe(
      `1.${'0.'.repeat(23)}8.b.d.0.1.0.0.2.ip6.arpa`
    );
  });

  it('should reject a non-address', () => {
    expect(() => reverseMapName('300.1.1.1')).toThrow(ValidationError);
  });
});
