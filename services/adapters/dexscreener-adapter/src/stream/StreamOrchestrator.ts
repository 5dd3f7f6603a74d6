/**
 * 行情流编排器
 *
 * 为每次运行创建独立的连接管理器，对解码结果应用记录筛选，并提供三种消费方式:
 * - collectBatch: 收集到目标数量或超时后返回
 * - stream: 对每个非空批次调用回调，结束时返回终止信号
 * - records: 逐条产出记录的异步迭代器
 *
 * 同一时间只允许一次运行。
 */

import { EventEmitter } from 'events';
import { createLogger, Logger, toError } from '@dexstream/shared-core';
import { ConnectionManager, ConnectionManagerOptions } from '../connector/ConnectionManager';
import {
  ConnectionEvent,
  ConnectionExit,
  ConnectionManagerConfig,
  FrameDecodedEventData
} from '../connector/interfaces';
import { MessageDecoder, SkippedOutcome } from '../protocol';
import { AdapterError, ConfigurationError, DecodedRecord } from '../types';
import { DexStreamAdapterConfig, toConnectionManagerConfig } from '../config';
import { RecordFilter, RecordFilterOptions } from './RecordFilter';

/** 运行结束信号: 显式停止或重试耗尽 */
export type StreamExit = ConnectionExit;

export interface RecordBatch {
  /** 通过筛选的记录，保持帧内顺序 */
  records: DecodedRecord[];
  /** 同一帧中被跳过的分块 */
  skipped: SkippedOutcome[];
  receivedAt: number;
}

export type BatchConsumer = (batch: RecordBatch) => void | Promise<void>;

export interface CollectBatchOptions {
  targetCount: number;
  /** 超时后返回已收集的记录 */
  timeoutMs: number;
}

export interface StreamOrchestratorOptions extends ConnectionManagerOptions {
  filter?: RecordFilterOptions;
}

export interface StreamStats {
  runs: number;
  framesDecoded: number;
  recordsDecoded: number;
  recordsFiltered: number;
  recordsForwarded: number;
  chunksSkipped: number;
  batchesDelivered: number;
}

export enum StreamEvent {
  STARTED = 'stream_started',
  BATCH = 'stream_batch',
  ENDED = 'stream_ended'
}

export class StreamBusyError extends AdapterError {
  constructor() {
    super('Stream already running', 'STREAM_BUSY');
    this.name = 'StreamBusyError';
  }
}

export class StreamOrchestrator extends EventEmitter {
  private readonly config: ConnectionManagerConfig;
  private readonly connectionOptions: ConnectionManagerOptions;
  private readonly filter: RecordFilter;
  private readonly logger: Logger;
  private active: ConnectionManager | null = null;
  private stats: StreamStats = {
    runs: 0,
    framesDecoded: 0,
    recordsDecoded: 0,
    recordsFiltered: 0,
    recordsForwarded: 0,
    chunksSkipped: 0,
    batchesDelivered: 0
  };

  constructor(config: ConnectionManagerConfig, options: StreamOrchestratorOptions = {}) {
    super();
    const { filter, ...connectionOptions } = options;

    this.config = config;
    this.logger = options.logger ?? createLogger({ level: 'info', format: 'json', component: 'stream-orchestrator' });
    this.connectionOptions = { ...connectionOptions, logger: this.logger };
    this.filter = new RecordFilter(filter);
  }

  /**
   * 根据适配器配置创建编排器
   */
  static fromConfig(
    config: DexStreamAdapterConfig,
    options: Omit<StreamOrchestratorOptions, 'filter'> = {}
  ): StreamOrchestrator {
    const logger = options.logger ?? createLogger({ ...config.logging, component: 'dexscreener-adapter' });
    return new StreamOrchestrator(toConnectionManagerConfig(config), {
      ...options,
      logger,
      decoder: options.decoder ?? new MessageDecoder(config.decoder, logger),
      filter: config.filter
    });
  }

  /**
   * 是否有运行中的连接
   */
  isRunning(): boolean {
    return this.active !== null;
  }

  getStats(): StreamStats {
    return { ...this.stats };
  }

  /**
   * 收集记录直到达到目标数量或超时
   * 连接在收集到任何记录前重试耗尽时以 RetryExhaustedError 拒绝
   */
  async collectBatch(options: CollectBatchOptions): Promise<DecodedRecord[]> {
    const { targetCount, timeoutMs } = options;
    if (!Number.isInteger(targetCount) || targetCount < 1) {
      throw new ConfigurationError(`targetCount must be a positive integer: ${targetCount}`);
    }

    const collected: DecodedRecord[] = [];
    const finished = this.run((batch) => {
      for (const record of batch.records) {
        if (collected.length < targetCount) {
          collected.push(record);
        }
      }
      if (collected.length >= targetCount) {
        this.requestStop('Target count reached');
      }
    });

    const timer = setTimeout(() => {
      this.requestStop('Batch timeout');
    }, timeoutMs);

    const exit = await finished.finally(() => clearTimeout(timer));
    if (exit.reason === 'retry_exhausted' && collected.length === 0) {
      throw exit.error;
    }
    return collected;
  }

  /**
   * 对每个非空批次调用回调；回调按顺序执行，抛出异常时停止运行并以该异常拒绝
   */
  async stream(onBatch: BatchConsumer): Promise<StreamExit> {
    let chain: Promise<void> = Promise.resolve();
    const consumer: { error?: Error } = {};

    const exit = await this.run((batch) => {
      chain = chain
        .then(() => (consumer.error ? undefined : onBatch(batch)))
        .catch((error: unknown) => {
          if (consumer.error) {
            return;
          }
          consumer.error = toError(error);
          this.logger.error('Batch consumer failed', { error: consumer.error.message });
          this.requestStop('Batch consumer failed');
        });
    });

    await chain;
    if (consumer.error) {
      throw consumer.error;
    }
    return exit;
  }

  /**
   * 逐条产出记录；停止时结束，重试耗尽时抛出 RetryExhaustedError
   * 已有运行时抛出 StreamBusyError 且不影响该运行；提前退出迭代会停止本次运行
   */
  async *records(): AsyncGenerator<DecodedRecord, void, undefined> {
    if (this.isRunning()) {
      throw new StreamBusyError();
    }

    const queue: DecodedRecord[] = [];
    const state: { exit?: StreamExit; failure?: Error; notify?: () => void } = {};
    const wake = (): void => {
      const notify = state.notify;
      state.notify = undefined;
      notify?.();
    };

    const finished = this.run((batch) => {
      queue.push(...batch.records);
      wake();
    }).then(
      (exit) => {
        state.exit = exit;
        wake();
      },
      (error: unknown) => {
        state.failure = toError(error);
        wake();
      }
    );
    // run() 同步登记本次连接，退出时只停止它
    const owned = this.active;

    try {
      for (;;) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (state.failure) {
          throw state.failure;
        }
        const exit = state.exit;
        if (exit) {
          if (exit.reason === 'retry_exhausted') {
            throw exit.error;
          }
          return;
        }
        await new Promise<void>((resolve) => {
          state.notify = resolve;
        });
      }
    } finally {
      await owned?.stop();
      await finished;
    }
  }

  /**
   * 请求停止当前运行并等待其结束
   */
  async stop(): Promise<void> {
    const connection = this.active;
    if (connection) {
      await connection.stop();
    }
  }

  // ============================================================================
  // 私有方法
  // ============================================================================

  private async run(onBatch: (batch: RecordBatch) => void): Promise<StreamExit> {
    if (this.active) {
      throw new StreamBusyError();
    }

    const connection = new ConnectionManager(this.config, this.connectionOptions);
    this.active = connection;
    this.stats.runs++;

    const onFrame = (event: FrameDecodedEventData): void => {
      this.handleFrame(event, onBatch);
    };
    connection.on(ConnectionEvent.FRAME_DECODED, onFrame);

    this.logger.info('Stream started', {
      connectionId: connection.id,
      url: this.config.url,
      filtered: !this.filter.isEmpty()
    });
    this.emit(StreamEvent.STARTED, { connectionId: connection.id });

    try {
      const exit = await connection.start();
      this.logger.info('Stream ended', {
        connectionId: connection.id,
        reason: exit.reason,
        recordsForwarded: this.stats.recordsForwarded
      });
      this.emit(StreamEvent.ENDED, exit);
      return exit;
    } finally {
      connection.off(ConnectionEvent.FRAME_DECODED, onFrame);
      this.active = null;
    }
  }

  private handleFrame(event: FrameDecodedEventData, onBatch: (batch: RecordBatch) => void): void {
    this.stats.framesDecoded++;

    const records: DecodedRecord[] = [];
    const skipped: SkippedOutcome[] = [];
    for (const outcome of event.outcomes) {
      if (outcome.status === 'skipped') {
        skipped.push(outcome);
        continue;
      }
      this.stats.recordsDecoded++;
      if (this.filter.matches(outcome.record)) {
        records.push(outcome.record);
      } else {
        this.stats.recordsFiltered++;
      }
    }
    this.stats.chunksSkipped += skipped.length;

    if (records.length === 0) {
      return;
    }

    this.stats.recordsForwarded += records.length;
    this.stats.batchesDelivered++;
    const batch: RecordBatch = { records, skipped, receivedAt: event.timestamp };
    this.emit(StreamEvent.BATCH, batch);
    onBatch(batch);
  }

  private requestStop(reason: string): void {
    const connection = this.active;
    if (!connection) {
      return;
    }
    this.logger.debug('Stopping stream', { connectionId: connection.id, reason });
    connection.stop().catch((error: unknown) => {
      this.logger.error('Stream stop failed', { connectionId: connection.id, error: toError(error).message });
    });
  }
}
