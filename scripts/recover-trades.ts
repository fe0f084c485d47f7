import { NestFactory } from '@nestjs/core';
import { readFileSync } from 'fs';
import { AppModule } from '../src/app.module';
import { parseAlertExport } from '../src/recovery/alert-export.parser';
import { TradeRecoveryService } from '../src/recovery/trade-recovery.service';

// Usage: recover-trades <export.csv> [--live] [--exits-only | --entries-only] [--after YYYY-MM-DD]
// Without --live nothing is written.
async function recoverTrades() {
  const args = process.argv.slice(2);
  const csvPath = args.find((arg, i) => !arg.startsWith('--') && args[i - 1] !== '--after');
  if (!csvPath) {
    console.error('Usage: recover-trades <export.csv> [--live] [--exits-only | --entries-only] [--after YYYY-MM-DD]');
    process.exitCode = 1;
    return;
  }

  const afterArg = args.includes('--after') ? args[args.indexOf('--after') + 1] : undefined;
  const after = afterArg ? new Date(`${afterArg}T00:00:00Z`) : undefined;
  if (after && Number.isNaN(after.getTime())) {
    console.error(`Invalid --after date: ${afterArg}. Use YYYY-MM-DD`);
    process.exitCode = 1;
    return;
  }

  const dryRun = !args.includes('--live');
  const options = {
    dryRun,
    entries: !args.includes('--exits-only'),
    exits: !args.includes('--entries-only'),
  };

  const { signals, rejected } = parseAlertExport(readFileSync(csvPath, 'utf-8'), after);

  console.log('\n=== TRADE RECOVERY ===\n');
  console.log(`File:     ${csvPath}`);
  console.log(`Mode:     ${dryRun ? 'DRY RUN (nothing is written)' : 'LIVE'}`);
  console.log(`Entries:  ${options.entries}`);
  console.log(`Exits:    ${options.exits}`);
  if (after) {
    console.log(`After:    ${after.toISOString()}`);
  }
  console.log(`Signals:  ${signals.length} parsed, ${rejected.length} rejected rows`);
  for (const row of rejected.slice(0, 10)) {
    console.log(`   row ${row.exportId}: ${row.reason}`);
  }

  const app = await NestFactory.createApplicationContext(AppModule);
  const recoveryService = app.get(TradeRecoveryService);

  try {
    const result = await recoveryService.replay(signals, options);

    console.log('\nResults:');
    console.log(`   Pyramids recorded:        ${result.pyramidsRecorded}`);
    console.log(`   Trades opened:            ${result.tradesOpened}`);
    console.log(`   Exits recorded:           ${result.exitsRecorded}`);
    console.log(`   Skipped (already stored): ${result.skippedExisting}`);
    console.log(`   Skipped (already closed): ${result.skippedClosed}`);
    console.log(`   Skipped (no open trade):  ${result.skippedNoOpenTrade}`);

    if (result.errors.length > 0) {
      console.log(`\nErrors (${result.errors.length}):`);
      for (const error of result.errors.slice(0, 10)) {
        console.log(`   - ${error}`);
      }
      if (result.errors.length > 10) {
        console.log(`   ... and ${result.errors.length - 10} more`);
      }
    }

    console.log(dryRun ? '\nDry run only. Re-run with --live to apply.\n' : '\nChanges applied.\n');
  } catch (error: unknown) {
    console.error('Error recovering trades:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }

  await app.close();
}

recoverTrades().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
