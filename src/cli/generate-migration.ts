#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { validateTableName } from '../utils/validate-table-name';

const DEFAULT_TABLE_NAME = 'workflow_runs';

export function generateMigration(tableName = DEFAULT_TABLE_NAME): string {
  validateTableName(tableName);

  return `-- migrate:up
CREATE TABLE ${tableName} (
    id CHAR(26) PRIMARY KEY,
    workflow_name TEXT NOT NULL,
    current_state TEXT NOT NULL,
    status TEXT NOT NULL,
    context JSONB NOT NULL DEFAULT '{}'::jsonb,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    started_at TIMESTAMPTZ NOT NULL,
    completed_at TIMESTAMPTZ,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${tableName}_status
    ON ${tableName} (status);

CREATE INDEX idx_${tableName}_workflow_name
    ON ${tableName} (workflow_name);

CREATE TABLE ${tableName}_history (
    run_id CHAR(26) NOT NULL REFERENCES ${tableName}(id),
    sequence INTEGER NOT NULL,
    state TEXT NOT NULL,
    entered_at TIMESTAMPTZ NOT NULL,
    PRIMARY KEY (run_id, sequence)
);

CREATE INDEX idx_${tableName}_history_entered_at
    ON ${tableName}_history (entered_at);

-- migrate:down
DROP TABLE IF EXISTS ${tableName}_history;
DROP TABLE IF EXISTS ${tableName};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      'Usage: agent-workflows generate-migration [tableName]\n\n' +
        'Generates a dbmate-compatible SQL migration for the run history tables.\n\n' +
        'Arguments:\n' +
        `  tableName    Run table name, default "${DEFAULT_TABLE_NAME}" (alphanumeric and underscores only)\n\n` +
        'Example:\n' +
        '  npx agent-workflows generate-migration agent_runs',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tableName = args[1] ?? DEFAULT_TABLE_NAME;
  const sql = generateMigration(tableName);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${tableName}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
