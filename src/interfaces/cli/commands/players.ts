import { Command } from 'commander';
import { DateTransformer } from '../../../shared/utilities/DateTransformer';
import { runWithContainer } from '../context';

const command = new Command('players').description('Player maintenance commands');

command
  .command('list')
  .description('List players with their join date')
  .action(async () => {
    await runWithContainer('players.list', container => {
      console.table(
        container.players.listPlayers().map(player => ({
          id: player.id,
          title: player.title,
          joined: player.joinDate ? DateTransformer.toCalendarDate(player.joinDate) : '',
          main: player.mainCharacterId ?? '',
        }))
      );
    });
  });

command
  .command('cleanup')
  .description('Delete players that own no characters')
  .action(async () => {
    await runWithContainer('players.cleanup', container => {
      const deleted = container.players.cleanupDummyPlayers();
      console.log(`Deleted ${deleted} empty players`);
    });
  });

export default command;
