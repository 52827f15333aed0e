/**
 * Email Format Generator
 * Generates local@domain.tld addresses from the bundled word lists
 */

import type { FormatGenerator } from '../../registry/format-registry.js';
import type { Rng } from '../../util/rng.js';
import { wordLists } from './words.js';

const EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9-]+(\.[a-zA-Z0-9-]+)*\.[a-zA-Z]{2,}$/;

export class EmailGenerator implements FormatGenerator {
  readonly name = 'email';
  readonly aliases = ['e-mail'];

  generate(rng: Rng): string {
    const words = wordLists();
    const first = rng.pick(words.firstNames);
    const last = rng.pick(words.lastNames);
    const separator = rng.pick(['.', '_', '']);
    const suffix = rng.bool(0.3) ? String(rng.int(1, 99)) : '';
    const domain = `${rng.pick(words.hostWords)}.${rng.pick(words.tlds)}`;
    return `${first}${separator}${last}${suffix}@${domain}`;
  }

  validate(value: string): boolean {
    return EMAIL_RE.test(value);
  }

  getExamples(): readonly string[] {
    return ['alice.adams@cedar.com', 'bruno_baker42@nimbus.io'];
  }
}
