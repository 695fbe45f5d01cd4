import archiver from 'archiver';
import { Response } from 'express';
import { getLogger } from '../../core/logging/LogManager';
import { CompletedJob } from './IScreenshotService';
import { JobWorkspace } from './JobWorkspace';

export function archiveFilename(jobId: string): string {
  return `screenshots_${jobId}.zip`;
}

/**
 * 把任务的全部截图打包为zip流式写入响应
 * 响应结束（或连接断开）后删除任务目录
 */
export class ScreenshotArchiver {
  private logger = getLogger('ScreenshotArchiver');

  constructor(private readonly workspace: JobWorkspace) {}

  stream(job: CompletedJob, res: Response): Promise<void> {
    const logger = this.logger.child({ jobId: job.id });

    return new Promise((resolve) => {
      let cleaned = false;
      const cleanup = (reason: string) => {
        if (cleaned) {
          return;
        }
        cleaned = true;
        this.workspace.remove(job.id)
          .then(() => logger.debug(`任务目录已删除 (${reason})`))
          .catch((error: unknown) => {
            logger.error('删除任务目录失败', { reason }, error instanceof Error ? error : undefined);
          })
          .finally(() => resolve());
      };

      // 已关闭的响应不会再触发finish或close
      if (res.writableEnded || res.destroyed) {
        cleanup('response already closed');
        return;
      }

      res.on('finish', () => cleanup('delivered'));
      res.on('close', () => cleanup('connection closed'));

      const archive = archiver('zip', { zlib: { level: 6 } });

      archive.on('warning', (warning: Error) => {
        logger.warn('打包警告', { error: warning.message });
      });

      archive.on('error', (error: Error) => {
        logger.error('打包截图失败', {}, error);
        res.destroy(error);
        cleanup('archive error');
      });

      res.status(200);
      res.attachment(archiveFilename(job.id));

      archive.pipe(res);
      for (const artifact of job.artifacts) {
        archive.file(artifact.path, { name: artifact.filename });
      }

      archive.finalize().catch((error: unknown) => {
        logger.error('结束打包失败', {}, error instanceof Error ? error : undefined);
        res.destroy();
        cleanup('finalize error');
      });
    });
  }
}
