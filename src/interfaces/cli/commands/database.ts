import { Command } from 'commander';
import { runWithContainer } from '../context';

const command = new Command('db').description('Database management commands');

command
  .command('init')
  .description('Create missing tables and the sentinel player')
  .option('--drop', 'Drop every table first; all data is lost')
  .action(async (options: { drop?: boolean }) => {
    await runWithContainer('db.init', container => {
      if (options.drop) {
        container.database.applySchema({ drop: true });
      }
      const sentinel = container.players.ensureSentinel();
      console.log(`Database ready at ${container.database.path} (sentinel player ${sentinel.id})`);
    });
  });

export default command;
