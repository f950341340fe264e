import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { TableSet } from '../src/domain/contracts';
import { FixtureDataLoaderService } from '../src/providers/fixtureDataLoaderService';
import { ConsoleLogger } from '../src/services/logging/logger';
import { IoPool } from '../src/services/pool/ioPool';
import { WizardController } from '../src/services/wizard/wizardController';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

function describeTables(label: string, tables: TableSet | undefined): void {
  if (!tables) {
    console.log(`${label}: none`);
    return;
  }
  console.log(`${label}:`);
  console.log(`  features ${tables.features.rows.length} x ${tables.features.columns.length}`);
  if (tables.targets) {
    console.log(`  targets  ${tables.targets.rows.length} x ${tables.targets.columns.length}`);
  }
  if (tables.odds) {
    console.log(`  odds     ${tables.odds.rows.length} x ${tables.odds.columns.length}`);
  }
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger({ level: 'info', scope: 'fixture-run' });
  const wizard = new WizardController({
    loaderService: new FixtureDataLoaderService({ rootDir: path.join(projectRoot, 'fixtures') }),
    pool: new IoPool(2),
    logger,
  });

  wizard.subscribe('notice', (notice) => console.log(`! ${notice.message}`));

  wizard.selectSport('Soccer');
  let snapshot = await wizard.advance();
  const rows = snapshot.state.availableParams ?? [];
  console.log(`Filter table: ${rows.length} row(s)`);

  const firstLeague = rows[0]?.league;
  const picked = rows.filter((row) => row.league === firstLeague).map((row) => row.id);
  snapshot = await wizard.confirmFilterSelection(picked);
  console.log(`Odds types: ${snapshot.oddsTypeOptions.map((option) => option.label).join(', ')}`);

  wizard.setExtractionConfig(snapshot.state.availableOddsTypes?.[0] ?? null, 0.5);
  snapshot = await wizard.advance();
  describeTables('Training data', snapshot.state.trainTables);
  describeTables('Fixtures data', snapshot.state.fixtureTables);

  await wizard.advance();
  const archive = await wizard.exportLoader();
  if (archive) {
    const outputDir = path.join(projectRoot, '.wizard-output');
    await fs.mkdir(outputDir, { recursive: true });
    const target = path.join(outputDir, archive.fileName);
    await fs.writeFile(target, archive.data);
    console.log(`Saved loader to ${target}`);
  }
}

main().catch((error: unknown) => {
  console.error('Fixture wizard run failed', error);
  process.exitCode = 1;
});
