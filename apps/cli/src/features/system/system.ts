// Store health and metadata commands

import type { HealthStatus, SystemMetadata } from '@tallyview/query';
import type { Command } from 'commander';
import { ok } from 'neverthrow';

import { runQueryCommand, withCommonOptions, type CommonCommandOptions } from '../shared/command-runtime.ts';

import { formatHealth, formatMetadata } from './system-view-utils.ts';

export function registerSystemCommand(program: Command): void {
  const system = program.command('system').description('Store health and metadata');

  withCommonOptions(system.command('health').description('Probe the loaded store')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<HealthStatus>(
        { execute: ({ health }) => ok(health.checkHealth()), formatText: formatHealth, name: 'system-health' },
        options
      );
    }
  );

  withCommonOptions(system.command('metadata').description('Show record count, load time and date range')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<SystemMetadata>(
        { execute: ({ health }) => ok(health.getMetadata()), formatText: formatMetadata, name: 'system-metadata' },
        options
      );
    }
  );
}
