/**
 * Apply Migrations Use Case
 *
 * Applies versioned SQL scripts (`V<digits>__<description>.sql`) from a
 * directory. Applied versions are recorded in the `migration_info` ledger;
 * each pending script runs in its own transaction together with its ledger
 * insert, in ascending numeric version order.
 *
 * Not safe to run concurrently against the same database: the ledger check
 * and the insert are not isolated from another runner.
 */

import { constants } from "node:fs";
import { access, readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { PersistenceError } from "../domain/errors/index.js";
import { leadingKeyword } from "../domain/services/statement-classifier.js";
import { requireNonNull } from "../domain/validation.js";
import { asString } from "../domain/value-objects/sql-value.js";
import { silentLogger, type Logger } from "../ports/logger.port.js";
import type { TransactionRunner } from "../ports/sql-executor.port.js";

export const MIGRATION_LEDGER_TABLE = "migration_info";

const MIGRATION_FILE = /^V(\d+)__(.+\.sql)$/;

export interface MigrationFile {
  version: string;
  description: string;
  name: string;
  path: string;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

export class MigrationRunner {
  constructor(
    private readonly executor: TransactionRunner,
    private readonly logger: Logger = silentLogger,
  ) {}

  async applyMigrations(directory: string): Promise<MigrationReport> {
    const dir = requireNonNull(directory, "string directory");
    await this.assertDirectory(dir);

    const files = await discoverMigrations(dir);
    const applied = await this.loadAppliedVersions();
    const report: MigrationReport = { applied: [], skipped: [] };

    for (const file of files) {
      if (applied.has(file.version)) {
        report.skipped.push(file.version);
        continue;
      }
      await this.apply(file);
      report.applied.push(file.version);
      this.logger.info("The migration has been successfully executed", {
        version: file.version,
        file: file.name,
      });
    }

    return report;
  }

  private async assertDirectory(directory: string): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await stat(directory)).isDirectory();
    } catch (error) {
      throw new PersistenceError(
        `Could not access migration directory '${directory}', make sure it exists`,
        { cause: error },
      );
    }
    if (!isDirectory) {
      throw new PersistenceError(
        `Could not access migration directory '${directory}', it is not a directory`,
      );
    }
  }

  private async loadAppliedVersions(): Promise<Set<string>> {
    try {
      return await this.executor.transaction(async (tx) => {
        await tx.run(
          `CREATE TABLE IF NOT EXISTS ${MIGRATION_LEDGER_TABLE} (migration_version TEXT PRIMARY KEY)`,
        );
        const rows = await tx.query(
          `SELECT migration_version FROM ${MIGRATION_LEDGER_TABLE}`,
        );
        return new Set(
          rows.map((row) => asString(row.get("migration_version") ?? null, "migration_version")),
        );
      });
    } catch (error) {
      throw new PersistenceError("Unable to read the migration ledger", { cause: error });
    }
  }

  private async apply(file: MigrationFile): Promise<void> {
    try {
      await this.executor.transaction(async (tx) => {
        const script = await readFile(file.path, "utf-8");
        for (const statement of splitScript(script)) {
          await tx.run(statement);
        }
        // version matched \d+ above
        await tx.run(
          `INSERT INTO ${MIGRATION_LEDGER_TABLE} (migration_version) VALUES ('${file.version}')`,
        );
      });
    } catch (error) {
      throw new PersistenceError(`Unable to perform migration '${file.name}'`, {
        cause: error,
      });
    }
  }
}

/**
 * List and validate every entry of a migration directory, sorted by numeric
 * version. Any entry that is not a readable `V<digits>__<description>.sql`
 * file fails the whole listing.
 */
export async function discoverMigrations(directory: string): Promise<MigrationFile[]> {
  let names: string[];
  try {
    names = (await readdir(directory)).sort();
  } catch (error) {
    throw new PersistenceError(`Could not list migration directory '${directory}'`, {
      cause: error,
    });
  }

  const files: MigrationFile[] = [];
  for (const name of names) {
    const match = MIGRATION_FILE.exec(name);
    const path = join(directory, name);
    if (!match || !(await isReadableFile(path))) {
      throw new PersistenceError(
        `Invalid migration file '${name}': expected a readable V<version>__<description>.sql file`,
      );
    }
    files.push({
      version: match[1],
      description: match[2].slice(0, -".sql".length),
      name,
      path,
    });
  }

  files.sort((a, b) => compareVersions(a.version, b.version));

  for (let i = 1; i < files.length; i++) {
    if (compareVersions(files[i - 1].version, files[i].version) === 0) {
      throw new PersistenceError(
        `Duplicate migration version ${files[i].version}: '${files[i - 1].name}' and '${files[i].name}'`,
      );
    }
  }

  return files;
}

/**
 * Split a script on `;` into statements, dropping fragments that hold only
 * whitespace or comments.
 */
export function splitScript(script: string): string[] {
  return script
    .split(";")
    .filter((fragment) => leadingKeyword(fragment) !== undefined)
    .map((fragment) => fragment.trim());
}

function compareVersions(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

async function isReadableFile(path: string): Promise<boolean> {
  try {
    if (!(await stat(path)).isFile()) return false;
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
