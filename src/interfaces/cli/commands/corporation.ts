import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { ValidatedConfiguration } from '../../../config';
import { NotFoundError } from '../../../shared/errors';
import { parseIntegerOption, runWithContainer } from '../context';

const command = new Command('corporation').description('Corporation and killmail lookups');

command
  .command('alliance')
  .description('Look up the alliance of the corporation')
  .option('--corporation <id>', 'Corporation id; defaults to CORPORATION_ID', parseIntegerOption)
  .action(async (options: { corporation?: number }) => {
    await runWithContainer('corporation.alliance', async container => {
      const corporationId = options.corporation ?? ValidatedConfiguration.corporation.corporationId;
      const allianceId = await container.esi.lookupAllianceId(corporationId);
      if (allianceId === null) {
        console.log(`Could not look up corporation ${corporationId}`);
      } else if (allianceId === 0) {
        console.log(`Corporation ${corporationId} is not in an alliance`);
      } else {
        console.log(`Corporation ${corporationId} belongs to alliance ${allianceId}`);
      }
    });
  });

command
  .command('logo')
  .description('Save the corporation logo as PNG')
  .argument('<file>', 'Output file')
  .option('--corporation <id>', 'Corporation id; defaults to CORPORATION_ID', parseIntegerOption)
  .option('--size <pixels>', 'Image size', parseIntegerOption, 128)
  .action(async (file: string, options: { corporation?: number; size: number }) => {
    await runWithContainer('corporation.logo', async container => {
      const corporationId = options.corporation ?? ValidatedConfiguration.corporation.corporationId;
      const logo = await container.esi.fetchCorporationLogo(corporationId, options.size);
      if (!logo) {
        throw new NotFoundError(`No logo for corporation ${corporationId}`, { corporationId });
      }
      writeFileSync(file, logo);
      console.log(`Saved ${logo.length} bytes to ${file}`);
    });
  });

command
  .command('killmail')
  .description('Look up the ISK value zKillboard gives a killmail')
  .argument('<id>', 'Killmail id', parseIntegerOption)
  .action(async (killmailId: number) => {
    await runWithContainer('corporation.killmail', async container => {
      const value = await container.esi.fetchKillmailValue(killmailId);
      console.log(
        value === null ? `zKillboard does not know killmail ${killmailId}` : `Killmail ${killmailId}: ${value} ISK`
      );
    });
  });

export default command;
