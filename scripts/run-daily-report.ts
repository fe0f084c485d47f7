import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { ReportsService } from '../src/reports/reports.service';

// Usage: run-daily-report [YYYY-MM-DD] [timezone]
async function runDailyReport() {
  const [date, timezoneArg] = process.argv.slice(2);
  const app = await NestFactory.createApplicationContext(AppModule);
  const reportsService = app.get(ReportsService);
  const timezone = timezoneArg || reportsService.timezone;

  console.log('\n=== DAILY REPORT ===\n');

  try {
    const report = await reportsService.generateDailyReport(date, timezone);

    console.log(`Day:        ${report.label} (${report.timezone})`);
    console.log(`Window:     ${report.window.start.toISOString()} -> ${report.window.end.toISOString()}`);
    console.log(`Trades:     ${report.totalTrades} (${report.totalPyramids} pyramids)`);
    console.log(`Capital:    ${report.capital}`);
    console.log(`Net profit: ${report.netProfit} (${report.netProfitPercent}%)`);
    console.log(`Win rate:   ${(report.winRate * 100).toFixed(1)}%`);
    console.log(`Profit factor: ${report.profitFactor === null ? 'n/a' : report.profitFactor}`);

    const pairs = Object.entries(report.byPair);
    if (pairs.length > 0) {
      console.log('\nBy pair:');
      for (const [pair, row] of pairs) {
        console.log(`   ${pair}: ${row.trades} trade(s), net ${row.netProfit}`);
      }
    }

    if (report.trades.length > 0) {
      console.log('\nTrades (best first):');
      for (const line of report.trades) {
        console.log(
          `   ${line.pair} on ${line.exchange}: ${line.pyramids} pyramid(s), net ${line.netPnl} (${line.netPnlPercent}%)`,
        );
      }
    }
    console.log('');
  } catch (error: unknown) {
    console.error('Error generating report:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }

  await app.close();
}

runDailyReport().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
