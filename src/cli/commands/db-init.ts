import { Command } from 'commander';
import { existsSync, promises as fs } from 'fs';
import { DatabaseService } from '../../services/database.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptConfirm } from '../utils/input.js';
import { loadCliConfig } from '../utils/library.js';
import { formatCliError } from '../utils/validation.js';

interface DbInitOptions {
  configPath?: string;
  force?: boolean;
}

export function createDbInitCommand(): Command {
  return new Command('db-init')
    .description('Create the library database and bring its schema up to date')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Delete and recreate the database without asking')
    .action(async (options: DbInitOptions) => {
      try {
        await initializeDatabase(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function initializeDatabase(options: DbInitOptions): Promise<void> {
  console.log('💾 Scriptorium Database Initialization');
  console.log('');

  const { config } = await loadCliConfig(options);
  const dbPath = config.database.path;
  console.log('📁 Database path:', dbPath);
  console.log('');

  if (existsSync(dbPath)) {
    const recreate = options.force || await promptConfirm(
      'Database already exists. Recreate it? This deletes all documents and indexes.',
      false
    );

    if (recreate) {
      console.log('🗑️  Removing existing database...');
      await deleteDatabase(dbPath);
      console.log('✅ Existing database removed');
    } else {
      console.log('Keeping the existing database; applying pending migrations only.');
    }
  }

  const dbService = new DatabaseService(dbPath, { busyTimeoutMs: config.database.busyTimeoutMs });
  const progress = new ProgressIndicator('Initializing database...');
  progress.start();

  try {
    dbService.initialize();
    progress.stop('Database initialized successfully!');

    const structure = describeDatabase(dbService);
    console.log('');
    console.log('📋 Database Structure:');
    for (const table of structure.tables) {
      console.log(`  ✅ Table: ${table.name} (${table.columns} columns)`);
    }
    for (const index of structure.indexes) {
      console.log(`  📊 Index: ${index}`);
    }
  } catch (error) {
    progress.fail('Database initialization failed');
    throw error;
  } finally {
    dbService.close();
  }

  console.log('');
  console.log('Next steps:');
  console.log('  1. Add documents: scriptorium add <file-or-directory>');
  console.log('  2. Ask a question: scriptorium query "<question>"');
  console.log('');
}

async function deleteDatabase(dbPath: string): Promise<void> {
  // WAL mode leaves sidecar files next to the database
  for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    await fs.rm(file, { force: true });
  }
}

function describeDatabase(dbService: DatabaseService): {
  tables: Array<{ name: string; columns: number }>;
  indexes: string[];
} {
  const db = dbService.getDb();

  const tables = db
    .prepare<[], { name: string }>(`
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
      ORDER BY name
    `)
    .all()
    .map(table => ({
      name: table.name,
      columns: db.prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)').all(table.name).length,
    }));

  const indexes = db
    .prepare<[], { name: string }>(`
      SELECT name FROM sqlite_master
      WHERE type = 'index' AND name NOT LIKE 'sqlite_%'
      ORDER BY name
    `)
    .all()
    .map(index => index.name);

  return { tables, indexes };
}
