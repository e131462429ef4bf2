// Ошибки прикладного уровня, которые HTTP и CLI различают по типу.

// Некорректный ввод пользователя: неизвестный язык, тип узла, параметры запроса.
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

// Сервис ещё не инициализирован (эмбеддер или хранилище не готовы).
export class ServiceNotReadyError extends Error {
  constructor(message = 'Search service is not initialized') {
    super(message);
    this.name = 'ServiceNotReadyError';
  }
}

// Текст ошибки для логов и ответов.
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
