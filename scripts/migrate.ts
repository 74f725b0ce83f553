/**
 * Migration CLI
 *
 * Applies versioned SQL scripts using the DATABASE_* environment settings.
 *
 *   DATABASE_URL=postgresql://localhost:5432/app npm run migrate
 *   DATABASE_DRIVER=sqlite DATABASE_URL=./data/app.db npm run migrate -- ./migrations
 */
import { runMigrationsFromEnv } from '../src/scripts/run-migrations.js';

async function migrate(): Promise<void> {
  console.log('🐘 Running migrations...');

  try {
    const report = await runMigrationsFromEnv({ directory: process.argv[2] });
    console.log(
      `✅ Migration complete! Applied: ${report.applied.length}, already applied: ${report.skipped.length}`,
    );
  } catch (err) {
    console.error('❌ Migration failed:', err);
    process.exitCode = 1;
  }
}

await migrate();
