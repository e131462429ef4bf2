// Генератор эмбеддингов текста.
export interface TextEmbedder {
  // Эмбеддинг фрагмента кода (документа).
  embed(input: string): Promise<number[]>;

  // Эмбеддинги в порядке входов; пустой вход даёт пустой результат.
  embedBatch(inputs: string[]): Promise<number[][]>;

  // Эмбеддинг поискового запроса (у некоторых моделей отличается от embed).
  embedQuery(input: string): Promise<number[]>;

  readonly dimensions: number;
}
