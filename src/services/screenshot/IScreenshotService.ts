import { Express } from 'express';
import { AppError } from '../../core/errors/AppError';

/**
 * 操作结果：探测、截帧、任务处理都以返回值传递错误，不抛异常
 */
export type Result<T, E extends AppError = AppError> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E extends AppError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * 任务状态：created → processing → completed | failed
 */
export type JobState = 'created' | 'processing' | 'completed' | 'failed';

/**
 * 截图计划中的一项
 */
export interface PlanEntry {
  /** 从1开始的序号 */
  index: number;
  /** index * duration / (count + 1) */
  offsetSeconds: number;
  /** 交给ffmpeg的整秒时间点 */
  seekSeconds: number;
}

/**
 * 单张截图
 */
export interface Artifact {
  index: number;
  filename: string;
  path: string;
  size: number;
}

/**
 * 截图任务
 */
export interface Job {
  id: string;
  directory: string;
  state: JobState;
  createdAt: Date;
  inputPath?: string;
  artifacts: Artifact[];
}

/**
 * 已完成的任务及其参数
 */
export interface CompletedJob extends Job {
  state: 'completed';
  durationSeconds: number;
  count: number;
  quality: number;
}

/**
 * 上传路由暂存的视频
 */
export interface UploadedVideo {
  originalName: string;
  sourcePath: string;
}

export interface ScreenshotOptions {
  count: number;
  quality: number;
}

/**
 * 时长探测器（ffprobe）
 */
export interface IDurationProber {
  probe(mediaPath: string): Promise<Result<number>>;
}

/**
 * 截帧器（ffmpeg）
 */
export interface IFrameExtractor {
  extractAt(mediaPath: string, seekSeconds: number, quality: number, destinationPath: string): Promise<Result<void>>;
}

/**
 * HTTP路由处理器
 */
export interface IRouteHandler {
  readonly name: string;
  readonly path: string;
  registerRoutes(app: Express): void;
}
