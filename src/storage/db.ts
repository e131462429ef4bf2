// Подключение к PostgreSQL.
import postgres from 'postgres';
import type { DatabaseConfig } from '../config/schema.js';

// Подавляем NOTICE от PostgreSQL (например CREATE ... IF NOT EXISTS).
const onnotice = (): void => {};

// url из конфигурации имеет приоритет над host/port/name/user/password.
export function createDb(config: DatabaseConfig): postgres.Sql {
  if (config.url) {
    return postgres(config.url, { onnotice });
  }
  return postgres({
    host: config.host,
    port: config.port,
    database: config.name,
    username: config.user,
    password: config.password,
    onnotice,
  });
}

export async function closeDb(sql: postgres.Sql): Promise<void> {
  await sql.end();
}
