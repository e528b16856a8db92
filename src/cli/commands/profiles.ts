import { Command } from 'commander';
import { ProfileError, ProfileLoader } from '../../profiles/loader.js';

export const profilesCommand = new Command('profiles').description('Inspect portal profiles');

profilesCommand
  .command('list')
  .description('List the available profiles')
  .action(() => {
    const names = new ProfileLoader().list();
    if (names.length === 0) {
      console.log('No profiles found.');
      return;
    }
    for (const name of names) {
      console.log(`  ${name}`);
    }
  });

profilesCommand
  .command('validate <name>')
  .description('Check that a profile loads and has every required field')
  .action((name: string) => {
    try {
      const profile = new ProfileLoader().load(name);
      console.log(`Profile "${name}" is valid (${profile.metadata.platform}).`);
      console.log(`  Course strategies: ${profile.courseDiscovery.order.join(' -> ')}`);
      console.log(`  Activity types: ${profile.assignments.types.map((t) => t.name).join(', ')}`);
    } catch (error) {
      if (error instanceof ProfileError) {
        console.error(error.message);
        process.exit(1);
      }
      throw error;
    }
  });
