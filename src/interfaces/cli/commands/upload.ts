import { Command } from 'commander';
import { readFileSync } from 'fs';
import { formatPeriod } from '../../../shared/utilities/period';
import { parseIntegerOption, parseNumberOption, runWithContainer } from '../context';

interface UploadOptions {
  year: number;
  month: number;
  taxRate: number;
  oreRate: number;
  by: string;
  overwrite?: boolean;
}

interface PeriodOptions {
  year: number;
  month: number;
}

const command = new Command('upload')
  .description('Upload a monthly workbook')
  .argument('<file>', 'Excel workbook with the PAP, 赏金 and 挖矿 sheets')
  .requiredOption('--year <year>', 'Year of the data', parseIntegerOption)
  .requiredOption('--month <month>', 'Month of the data (1-12)', parseIntegerOption)
  .requiredOption('--tax-rate <rate>', 'Corporation tax rate used to derive bounty income', parseNumberOption)
  .requiredOption('--ore-rate <rate>', 'ISK per m3 of mined ore', parseNumberOption)
  .requiredOption('--by <name>', 'Who uploads the data')
  .option('--overwrite', 'Replace existing data for the month')
  .action(async (file: string, options: UploadOptions) => {
    await runWithContainer('upload', async container => {
      const result = await container.uploads.processUpload({
        workbook: readFileSync(file),
        year: options.year,
        month: options.month,
        taxRate: options.taxRate,
        oreConvertRate: options.oreRate,
        uploadedBy: options.by,
        overwrite: options.overwrite ?? false,
      });

      const { counts, reconciliation } = result;
      console.log(
        `Uploaded ${formatPeriod(result)}: ${counts.activity} PAP, ${counts.bounty} bounty, ${counts.mining} mining records`
      );
      if (reconciliation) {
        console.log(
          `Reconciliation: ${reconciliation.checked} checked, ${reconciliation.fixed} fixed, ` +
            `${reconciliation.failed} failed, ${reconciliation.deleted} deleted`
        );
      }
      if (result.reconciliationPending) {
        console.log('Some characters are still unresolved; run "characters fix-orphans" later.');
      }
    });
  });

command
  .command('list')
  .description('List uploaded months')
  .action(async () => {
    await runWithContainer('upload.list', container => {
      console.table(
        container.uploads.listUploads().map(upload => ({
          month: upload.period,
          uploadedAt: upload.uploadedAt.toISOString(),
          by: upload.uploadedBy,
          taxRate: upload.taxRate,
          oreRate: upload.oreConvertRate,
        }))
      );
    });
  });

command
  .command('delete')
  .description('Delete the data of one month')
  .requiredOption('--year <year>', 'Year of the data', parseIntegerOption)
  .requiredOption('--month <month>', 'Month of the data (1-12)', parseIntegerOption)
  .action(async (options: PeriodOptions) => {
    await runWithContainer('upload.delete', container => {
      const deleted = container.uploads.deleteUpload(options.year, options.month);
      console.log(deleted ? `Deleted ${formatPeriod(options)}` : `No upload for ${formatPeriod(options)}`);
    });
  });

command
  .command('summary')
  .description('Per-player totals and status of one month')
  .requiredOption('--year <year>', 'Year of the data', parseIntegerOption)
  .requiredOption('--month <month>', 'Month of the data (1-12)', parseIntegerOption)
  .action(async (options: PeriodOptions) => {
    await runWithContainer('upload.summary', container => {
      const summary = container.summaries.getUploadSummary(options.year, options.month);
      console.log(`${formatPeriod(summary)} uploaded by ${summary.uploadedBy}`);
      console.table(
        summary.players.map(player => ({
          title: player.titleText,
          main: player.mainCharacter ?? '',
          pap: player.totalPap,
          strategic: player.strategicPap,
          tax: player.totalTax,
          mining: player.totalMiningVolume,
          income: Math.round(player.totalIncome),
          status: player.status,
        }))
      );
    });
  });

export default command;
