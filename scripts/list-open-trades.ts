import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { TradesService } from '../src/trades/trades.service';

async function listOpenTrades() {
  const app = await NestFactory.createApplicationContext(AppModule);
  const tradesService = app.get(TradesService);

  console.log('\n=== OPEN TRADES ===\n');

  try {
    const open = await tradesService.findOpen(500);
    if (open.length === 0) {
      console.log('   No open trades\n');
    }

    for (const summary of open) {
      const trade = await tradesService.findOne(summary.id);
      console.log(`   ${trade.pair} on ${trade.exchange}`);
      console.log(`     ID: ${trade.id}`);
      console.log(`     Opened: ${trade.openedAt.toISOString()}`);
      for (const pyramid of trade.pyramids) {
        const warnings = pyramid.warnings.length > 0 ? ` [${pyramid.warnings.join('; ')}]` : '';
        console.log(`     #${pyramid.index}: ${pyramid.size} @ ${pyramid.entryPrice} (fee ${pyramid.entryFee})${warnings}`);
      }
      console.log('');
    }
  } catch (error: unknown) {
    console.error('Error listing trades:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }

  await app.close();
}

listOpenTrades().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
