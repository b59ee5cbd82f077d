import { describe, it, expect } from 'vitest';
import { createLogger, type Level, type LoggerOptions } from '../api/_lib/logger';

function capture(options: Partial<LoggerOptions> = {}) {
  const lines: Array<{ level: Level; line: string }> = [];
  const log = createLogger({
    level: 'info',
    service: 'test-service',
    pretty: false,
    silent: false,
    redactKeys: [],
    write: (level, line) => { lines.push({ level, line }); },
    ...options,
  });
  return { log, lines };
}

describe('createLogger', () => {
  it('drops entries below the configured level', () => {
    const { log, lines } = capture({ level: 'warn' });
    log.info('ignored');
    log.warn('kept');
    expect(lines.map(l => l.level)).toEqual(['warn']);
  });

  it('writes nothing when silent', () => {
    const { log, lines } = capture({ silent: true });
    log.fatal('ignored');
    expect(lines).toEqual([]);
  });

  it('writes JSON lines with bindings and redacted fields', () => {
    const { log, lines } = capture({ redactKeys: ['sender'] });
    log.child({ module: 'riskPipeline' }).info('Stage done', { token: 'test-secret', sender: 'eng', count: 2 });

    expect(JSON.parse(lines[0].line)).toMatchObject({
      level: 'info',
      service: 'test-service',
      message: 'Stage done',
      module: 'riskPipeline',
      token: '[REDACTED]',
      sender: '[REDACTED]',
      count: 2,
    });
  });

  it('nests errors under "error"', () => {
    const { log, lines } = capture();
    log.error('Stage failed', new Error('bad input'));
    expect(JSON.parse(lines[0].line).error).toMatchObject({ name: 'Error', message: 'bad input' });
  });

  it('formats pretty lines with their bindings', () => {
    const { log, lines } = capture({ pretty: true });
    log.child({ module: 'health' }).info('ok', { n: 1 });
    expect(lines[0].line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO \[module=health\]: ok \{"n":1\}$/);
  });
});
