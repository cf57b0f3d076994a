import { domainToASCII } from 'node:url';

import type { IdnConverter } from '../types.js';
import type { CanonOutputW } from './output.js';

/** IDNA conversion backed by Node's WHATWG URL implementation. */
export const nodeIdnConverter: IdnConverter = {
  toAscii(input: string, output: CanonOutputW): boolean {
    const ascii = domainToASCII(input);
    if (ascii.length === 0) {
      return false;
    }
    for (let i = 0; i < ascii.length; i += 1) {
      output.pushBack(ascii.charCodeAt(i));
    }
    return true;
  },
};
