import { Command } from 'commander';
import { createDefaultRegistry } from '../../services/adapters';
import { taskNameFor } from '../../services/task-orchestrator';

export const adaptersCommand = new Command('adapters')
  .description('List the built-in adapters and their task names')
  .option('--json', 'Output raw JSON')
  .action((options: { json?: boolean }) => {
    const adapters = createDefaultRegistry().list();

    if (options.json) {
      console.log(JSON.stringify(adapters.map(name => ({ name, task: taskNameFor(name) })), null, 2));
      return;
    }

    for (const name of adapters) {
      console.log(`${name.padEnd(8)} ${taskNameFor(name)}`);
    }
  });
