/**
 * Network Format Generators
 * hostname, uri, ipv4 and ipv6
 */

import type { FormatGenerator } from '../../registry/format-registry.js';
import type { Rng } from '../../util/rng.js';
import { hexString } from './uuid-generator.js';
import { wordLists } from './words.js';

const LABEL_RE = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;

function isHostname(value: string): boolean {
  return (
    value.length <= 253 &&
    value.split('.').every((label) => LABEL_RE.test(label))
  );
}

function drawHost(rng: Rng): string {
  const words = wordLists();
  const labels = [rng.pick(words.hostWords)];
  if (rng.bool(0.5)) labels.unshift(rng.pick(['www', 'api', 'app', 'cdn']));
  labels.push(rng.pick(words.tlds));
  return labels.join('.');
}

export class HostnameGenerator implements FormatGenerator {
  readonly name = 'hostname';

  generate(rng: Rng): string {
    return drawHost(rng);
  }

  validate(value: string): boolean {
    return value.includes('.') && isHostname(value);
  }

  getExamples(): readonly string[] {
    return ['api.cedar.io', 'summit.com'];
  }
}

export class UriGenerator implements FormatGenerator {
  readonly name = 'uri';
  readonly aliases = ['url'];

  generate(rng: Rng): string {
    const words = wordLists();
    const scheme = rng.bool(0.8) ? 'https' : 'http';
    const segments: string[] = [];
    const depth = rng.int(0, 3);
    for (let i = 0; i < depth; i++) segments.push(rng.pick(words.pathWords));
    const path = segments.length > 0 ? `/${segments.join('/')}` : '';
    return `${scheme}://${drawHost(rng)}${path}`;
  }

  validate(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol.length > 1 && url.hostname.length > 0;
    } catch {
      return false;
    }
  }

  getExamples(): readonly string[] {
    return ['https://www.cedar.io/api/users', 'http://summit.com'];
  }
}

export class Ipv4Generator implements FormatGenerator {
  readonly name = 'ipv4';
  readonly aliases = ['ip', 'ip-address'];

  generate(rng: Rng): string {
    return [0, 1, 2, 3].map(() => rng.int(0, 255)).join('.');
  }

  validate(value: string): boolean {
    const octets = value.split('.');
    return (
      octets.length === 4 &&
      octets.every(
        (octet) =>
          /^(0|[1-9]\d{0,2})$/.test(octet) && Number(octet) <= 255
      )
    );
  }

  getExamples(): readonly string[] {
    return ['192.168.0.1', '10.0.0.255'];
  }
}

export class Ipv6Generator implements FormatGenerator {
  readonly name = 'ipv6';
  readonly aliases = ['ipv6-address'];

  generate(rng: Rng): string {
    const groups: string[] = [];
    for (let i = 0; i < 8; i++) groups.push(hexString(rng, 4));
    return groups.join(':');
  }

  validate(value: string): boolean {
    if (value.includes('::')) {
      const [head = '', tail = ''] = value.split('::');
      const parts = [...head.split(':'), ...tail.split(':')].filter(Boolean);
      return (
        value.split('::').length === 2 &&
        parts.length < 8 &&
        parts.every((g) => /^[0-9a-fA-F]{1,4}$/.test(g))
      );
    }
    const groups = value.split(':');
    return groups.length === 8 && groups.every((g) => /^[0-9a-fA-F]{1,4}$/.test(g));
  }

  getExamples(): readonly string[] {
    return ['2001:0db8:85a3:0000:0000:8a2e:0370:7334', 'fe80::1'];
  }
}
