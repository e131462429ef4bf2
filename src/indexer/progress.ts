// Репортер прогресса индексации.
import type { IndexPlan } from './change-detector.js';
import type { IndexResponse } from './types.js';

export interface ProgressReporter {
  onPlan(plan: IndexPlan): void;
  onFileError(message: string): void;
  onBatchComplete(processedFiles: number, totalFiles: number): void;
  onComplete(response: IndexResponse): void;
}

// Вывод прогресса в консоль.
export class ConsoleProgress implements ProgressReporter {
  onPlan(plan: IndexPlan): void {
    const mode = plan.mode === 'incremental' ? 'инкрементальный' : 'полный';
    console.log(
      `  Режим: ${mode}; к индексации ${plan.toIndex.length} файлов, к удалению ${plan.toDelete.length}`,
    );
  }

  onFileError(message: string): void {
    console.error(`  Ошибка: ${message}`);
  }

  onBatchComplete(processedFiles: number, totalFiles: number): void {
    console.log(`  Обработано: ${processedFiles}/${totalFiles}`);
  }

  onComplete(response: IndexResponse): void {
    console.log(
      `  Готово: ${response.totalFiles} файлов, ${response.totalChunks} фрагментов ` +
      `(новых ${response.indexedChunks}, обновлено ${response.updatedChunks}, ` +
      `удалено ${response.deletedChunks}) за ${response.durationSeconds.toFixed(1)}с`,
    );
    if (response.errors.length > 0) {
      console.log(`  Ошибок: ${response.errors.length}`);
    }
  }
}

// Без вывода: HTTP-индексация и тесты.
export class SilentProgress implements ProgressReporter {
  onPlan(): void {}
  onFileError(): void {}
  onBatchComplete(): void {}
  onComplete(): void {}
}
