/**
 * Built-in Format Generators
 */

export { UUIDGenerator } from './uuid-generator.js';
export { EmailGenerator } from './email-generator.js';
export { DateGenerator } from './date-generator.js';
export { DateTimeGenerator } from './datetime-generator.js';
export {
  HostnameGenerator,
  UriGenerator,
  Ipv4Generator,
  Ipv6Generator,
} from './network-generators.js';
export {
  ByteGenerator,
  BinaryGenerator,
  PasswordGenerator,
} from './binary-generators.js';

import { UUIDGenerator } from './uuid-generator.js';
import { EmailGenerator } from './email-generator.js';
import { DateGenerator } from './date-generator.js';
import { DateTimeGenerator } from './datetime-generator.js';
import {
  HostnameGenerator,
  UriGenerator,
  Ipv4Generator,
  Ipv6Generator,
} from './network-generators.js';
import {
  ByteGenerator,
  BinaryGenerator,
  PasswordGenerator,
} from './binary-generators.js';
import {
  FormatRegistry,
  type FormatGenerator,
} from '../../registry/format-registry.js';

export function builtInFormats(): FormatGenerator[] {
  return [
    new DateGenerator(),
    new DateTimeGenerator(),
    new PasswordGenerator(),
    new ByteGenerator(),
    new BinaryGenerator(),
    new EmailGenerator(),
    new UUIDGenerator(),
    new UriGenerator(),
    new HostnameGenerator(),
    new Ipv4Generator(),
    new Ipv6Generator(),
  ];
}

/** Registry holding every format of the string schema model. */
export function createDefaultFormatRegistry(): FormatRegistry {
  return new FormatRegistry(builtInFormats());
}
