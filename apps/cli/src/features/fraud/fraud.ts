// Fraud summary and scoring commands

import { formatZodIssues, FraudPredictionInputSchema, fromZod } from '@tallyview/core';
import type { ChannelFraudStats, FraudPrediction, FraudSummary } from '@tallyview/query';
import type { Command } from 'commander';
import { ok } from 'neverthrow';

import { InvalidInputError } from '../shared/cli-error.ts';
import { runQueryCommand, withCommonOptions, type CommonCommandOptions } from '../shared/command-runtime.ts';

import { formatChannelFraudStats, formatFraudPrediction, formatFraudSummary } from './fraud-view-utils.ts';

interface PredictCommandOptions extends CommonCommandOptions {
  amount: string;
  channelType?: string | undefined;
  errors?: string | undefined;
}

/**
 * Validate the candidate transaction the same way the HTTP predict endpoint does.
 */
export function parsePredictionInput(options: Pick<PredictCommandOptions, 'amount' | 'channelType' | 'errors'>) {
  return fromZod(FraudPredictionInputSchema, {
    amount: options.amount,
    channelType: options.channelType,
    errors: options.errors,
  }).mapErr((error) => {
    const issues = formatZodIssues(error);
    return new InvalidInputError(issues.map((issue) => `${issue.path}: ${issue.message}`).join('; '), issues);
  });
}

/**
 * Register the fraud command group.
 *
 * Structure:
 *   fraud summary   - Flagged count, rate and amount
 *   fraud by-type   - Fraud rate per payment channel
 *   fraud predict   - Score a candidate transaction
 */
export function registerFraudCommand(program: Command): void {
  const fraud = program.command('fraud').description('Fraud statistics and scoring');

  withCommonOptions(fraud.command('summary').description('Show flagged transaction totals')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<FraudSummary>(
        { execute: ({ fraud }) => ok(fraud.getSummary()), formatText: formatFraudSummary, name: 'fraud-summary' },
        options
      );
    }
  );

  withCommonOptions(fraud.command('by-type').description('Show fraud rate per payment channel')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<ChannelFraudStats[]>(
        {
          execute: ({ fraud }) => ok(fraud.getStatsByChannelType()),
          formatText: formatChannelFraudStats,
          name: 'fraud-by-type',
        },
        options
      );
    }
  );

  withCommonOptions(
    fraud
      .command('predict')
      .description('Score a candidate transaction from 0 to 1')
      .requiredOption('--amount <amount>', 'Transaction amount, e.g. 1250 or $1250.00')
      .option('--channel-type <type>', 'Payment channel, e.g. "Online Transaction"')
      .option('--errors <flag>', 'Error flag reported for the transaction')
  )
    .addHelpText(
      'after',
      `
Examples:
  $ tallyview fraud predict --amount 1500 --channel-type "Online Transaction"
  $ tallyview fraud predict --amount 20 --errors "Insufficient Balance" --json
`
    )
    .action(async (options: PredictCommandOptions) => {
      await runQueryCommand<FraudPrediction>(
        {
          execute: ({ fraud }) => parsePredictionInput(options).map((input) => fraud.predict(input)),
          formatText: formatFraudPrediction,
          name: 'fraud-predict',
        },
        options
      );
    });
}
