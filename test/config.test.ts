import { TARGET_ENV, parseCliOptions } from '../src/config.js';

describe('parseCliOptions()', () => {
  it('should apply defaults', () => {
    const result = parseCliOptions({ names: ['[Group] Show'], target: '/library' });
    expect(result).toMatchObject({
      ok: true,
      options: { names: ['[Group] Show'], dryRun: false, logLevel: 'INFO', target: '/library', concurrency: 10 },
    });
    expect(result.ok && result.options.archive).toBeUndefined();
  });

  it('should accept log levels in any case', () => {
    const result = parseCliOptions({ names: ['a'], target: '/library', logLevel: 'debug' });
    expect(result.ok && result.options.logLevel).toBe('DEBUG');
  });

  it('should reject unknown log levels', () => {
    expect(parseCliOptions({ names: ['a'], target: '/library', logLevel: 'verbose' })).toEqual({
      ok: false,
      error: 'logLevel: 日志级别必须是 DEBUG, INFO, WARNING, ERROR, CRITICAL 之一',
    });
  });

  it('should require a target directory', () => {
    expect(parseCliOptions({ names: ['a'] })).toEqual({
      ok: false,
      error: `target: 必须通过 --target 或环境变量 ${TARGET_ENV} 指定媒体库目录`,
    });
  });

  it('should require at least one folder', () => {
    expect(parseCliOptions({ names: [], target: '/library' })).toEqual({ ok: false, error: 'names: 至少需要一个文件夹' });
  });

  it('should coerce the concurrency from a string', () => {
    const result = parseCliOptions({ names: ['a'], target: '/library', concurrency: '4' });
    expect(result.ok && result.options.concurrency).toBe(4);
    expect(parseCliOptions({ names: ['a'], target: '/library', concurrency: '0' }).ok).toBe(false);
  });

  it('should keep the archive directory and dry-run flag', () => {
    const result = parseCliOptions({ names: ['a'], target: '/library', archive: '/archive', dryRun: true });
    expect(result).toMatchObject({ ok: true, options: { archive: '/archive', dryRun: true } });
  });
});
