import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

export const TARGET_ENV = 'ANIME_ARRANGER_TARGET';
export const ARCHIVE_ENV = 'ANIME_ARRANGER_ARCHIVE';

// 退出码：0 全部成功，1 有文件夹处理失败，2 参数错误
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const logLevelSchema = z
  .string()
  .default('INFO')
  .transform(level => level.toUpperCase())
  .pipe(z.enum(LOG_LEVELS, { errorMap: () => ({ message: `日志级别必须是 ${LOG_LEVELS.join(', ')} 之一` }) }));

export const cliOptionsSchema = z.object({
  names: z.array(z.string().min(1)).min(1, '至少需要一个文件夹'),
  dryRun: z.boolean().default(false),
  logLevel: logLevelSchema,
  target: z.string({ required_error: `必须通过 --target 或环境变量 ${TARGET_ENV} 指定媒体库目录` }).min(1),
  archive: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().positive().default(10),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * 校验命令行参数，失败时返回可直接打印的错误信息
 */
export function parseCliOptions(input: unknown): { ok: true; options: CliOptions } | { ok: false; error: string } {
  const result = cliOptionsSchema.safeParse(input);
  if (result.success) {
    return { ok: true, options: result.data };
  }
  const error = result.error.issues.map(issue => `${issue.path.join('.') || '参数'}: ${issue.message}`).join('\n');
  return { ok: false, error };
}
