import { Command } from 'commander';
import { ValidatedConfiguration } from '../../../config';
import { DateTransformer } from '../../../shared/utilities/DateTransformer';
import { runWithContainer } from '../context';

const command = new Command('state').description('Latest feed date and reference data version');

const show = (date: Date | null) => (date ? DateTransformer.toCalendarDate(date) : 'not set');

command
  .command('show')
  .description('Print the stored dates and the corporation settings')
  .action(async () => {
    await runWithContainer('state.show', container => {
      const { siteName, corporationId, allianceId, localTimezone, startupDate } = ValidatedConfiguration.corporation;
      console.log(`Site:          ${siteName}`);
      console.log(`Corporation:   ${corporationId}`);
      console.log(`Alliance:      ${allianceId ?? 'not configured'}`);
      console.log(`Timezone:      ${localTimezone}`);
      console.log(`Started:       ${startupDate}`);
      console.log(`Latest update: ${show(container.systemState.getLatestUpdate())}`);
      console.log(`SDE version:   ${show(container.systemState.getSdeVersion())}`);
    });
  });

command
  .command('set-latest')
  .description('Set the latest processed feed date')
  .argument('<date>', 'yyyy-MM-dd')
  .action(async (date: string) => {
    await runWithContainer('state.set-latest', container => {
      console.log(`Latest update set to ${container.systemState.setLatestUpdate(date)}`);
    });
  });

command
  .command('set-sde')
  .description('Set the reference data version date')
  .argument('<date>', 'yyyy-MM-dd')
  .action(async (date: string) => {
    await runWithContainer('state.set-sde', container => {
      console.log(`SDE version set to ${container.systemState.setSdeVersion(date)}`);
    });
  });

export default command;
