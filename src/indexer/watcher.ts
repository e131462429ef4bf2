// Периодическая инкрементальная индексация.
import { errorMessage } from '../errors.js';
import type { CodeIndexer } from './indexer.js';
import type { IndexRequest, IndexResponse } from './types.js';

export interface IndexWatcherHandlers {
  onResult?(response: IndexResponse): void;
  onError?(message: string): void;
}

/**
 * Запускает index() каждые intervalMs. Следующий прогон планируется
 * после завершения текущего, поэтому прогоны не пересекаются.
 */
export class IndexWatcher {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private stopped = true;

  constructor(
    private readonly indexer: Pick<CodeIndexer, 'index'>,
    private readonly request: IndexRequest,
    private readonly intervalMs: number,
    private readonly handlers: IndexWatcherHandlers = {},
  ) {}

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.schedule(0);
  }

  // Останавливает планирование и дожидается текущего прогона.
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.running = this.runOnce().finally(() => {
        this.running = null;
        if (!this.stopped) {
          this.schedule(this.intervalMs);
        }
      });
    }, delayMs);
  }

  private async runOnce(): Promise<void> {
    try {
      const response = await this.indexer.index({ ...this.request, incremental: true });
      this.handlers.onResult?.(response);
    } catch (error) {
      this.handlers.onError?.(errorMessage(error));
    }
  }
}
