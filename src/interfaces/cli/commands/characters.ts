import { Command } from 'commander';
import { SweepScope } from '../../../services/reconciliation';
import { NotFoundError } from '../../../shared/errors';
import { Period, formatPeriod } from '../../../shared/utilities/period';
import { parsePeriodOption, runWithContainer } from '../context';

const command = new Command('characters').description('Character maintenance commands');

command
  .command('fix-orphans')
  .description('Resolve placeholder characters against ESI')
  .option('--upload <year-month>', 'Only records of this month (YYYY-MM)', parsePeriodOption)
  .action(async (options: { upload?: Period }) => {
    await runWithContainer('characters.fix-orphans', async container => {
      let scope: SweepScope = 'all';
      if (options.upload) {
        const upload = container.uploads.findUpload(options.upload.year, options.upload.month);
        if (!upload) {
          throw new NotFoundError(`No upload for ${formatPeriod(options.upload)}`);
        }
        scope = { uploadId: upload.id };
      }

      const result = await container.sweeper.fixOrphans(scope);
      console.log(
        `Checked ${result.checked} records: ${result.fixed} fixed, ${result.failed} failed, ` +
          `${result.deleted} deleted, ${result.pending} placeholders left`
      );
    });
  });

command
  .command('placeholders')
  .description('List characters not yet matched to an ESI character')
  .action(async () => {
    await runWithContainer('characters.placeholders', container => {
      const placeholders = container.players.listPlaceholders();
      if (placeholders.length === 0) {
        console.log('No placeholder characters');
        return;
      }
      console.table(placeholders.map(({ id, name, title, playerId }) => ({ id, name, title: title ?? '', playerId })));
    });
  });

command
  .command('assign')
  .description("Move a character to the player with a title; defaults to the character's own title")
  .argument('<name>', 'Character name (remember to use quotes)')
  .option('--title <title>', 'Title of the target player')
  .action(async (name: string, options: { title?: string }) => {
    await runWithContainer('characters.assign', container => {
      const { character, player } = container.players.assignCharacterToTitle(name, options.title);
      console.log(`Assigned ${character.name} to player '${player.title}'`);
    });
  });

export default command;
