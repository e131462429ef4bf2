// Последовательное применение миграций с учётом в таблице _migrations.
import type postgres from 'postgres';

export interface Migration {
  name: string;
  up(sql: postgres.Sql): Promise<void>;
  // Есть ли объекты миграции в базе. false при записи в журнале — миграция применяется снова.
  isPresent?(sql: postgres.Sql): Promise<boolean>;
}

async function ensureMigrationsTable(sql: postgres.Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;
}

export async function getAppliedMigrations(sql: postgres.Sql): Promise<string[]> {
  await ensureMigrationsTable(sql);
  const rows = await sql<{ name: string }[]>`SELECT name FROM _migrations ORDER BY applied_at`;
  return rows.map((row) => row.name);
}

async function isPending(sql: postgres.Sql, migration: Migration, applied: Set<string>): Promise<boolean> {
  if (!applied.has(migration.name)) {
    return true;
  }
  // Журналу не верим, если объекты удалены вручную.
  return migration.isPresent ? !(await migration.isPresent(sql)) : false;
}

/**
 * Применяет ожидающие миграции по порядку и возвращает их имена.
 * Запись в _migrations добавляется (или обновляется) только после успешного up.
 */
export async function runMigrations(sql: postgres.Sql, migrations: Migration[]): Promise<string[]> {
  const applied = new Set(await getAppliedMigrations(sql));
  const ran: string[] = [];

  for (const migration of migrations) {
    if (!await isPending(sql, migration, applied)) {
      continue;
    }
    await migration.up(sql);
    await sql`
      INSERT INTO _migrations (name) VALUES (${migration.name})
      ON CONFLICT (name) DO UPDATE SET applied_at = now()
    `;
    ran.push(migration.name);
  }

  return ran;
}
