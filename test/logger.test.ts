import { afterEach, describe, expect, it } from 'vitest';

import { configureLogger, getLogger, resetLogger } from '../src/logger.js';

afterEach(() => {
  resetLogger();
});

describe('logger', () => {
  it('writes JSON lines tagged with the service name', () => {
    const lines: string[] = [];
    configureLogger({ level: 'warn', destination: { write: (line: string) => lines.push(line) } });

    getLogger().info('not written');
    getLogger().warn({ url: 'http://h/' }, 'hello');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 40,
      service: 'url-canon',
      url: 'http://h/',
      msg: 'hello',
    });
  });
});
