import yargs from 'yargs';
import chalk from 'chalk';

import { ClassifierConfig } from './config/classifier-config';
import { classifyMessages, recommendNextSteps, serializeIssues } from './core/classifier';
import { collectWorkloadEvents } from './core/events';
import { initKube } from './core/kube';
import { loadRuleTable } from './core/rules';
import { logDebug, logInfo, setLogLevel } from './utils/utils';

export type OutputWriter = (text: string) => void;

const writeToStdout: OutputWriter = (text) => {
  process.stdout.write(text);
};

/**
 * Parses the command line and runs the requested command.
 * Result documents are handed to `write`; diagnostics go to stderr.
 */
export async function runCli(argv: string[], write: OutputWriter = writeToStdout): Promise<void> {
  // classify and next-steps always print a result, so a stray variable only warns here.
  const config = ClassifierConfig.fromEnvironment(process.env, { lenient: true });
  const classification = config.getClassificationConfig();

  setLogLevel(config.getAppConfig().logLevel);

  await yargs(argv)
    .scriptName('workload-issues')
    .usage('$0 <command> [options]')
    .option('namespace', {
      type: 'string',
      default: classification.namespace,
      describe: 'Namespace used in suggested next steps and by scan',
    })
    .option('context', {
      type: 'string',
      default: classification.context,
      describe: 'Cluster context used in escalation steps and by scan',
    })
    .option('rules', {
      type: 'string',
      default: classification.rulesFile,
      describe: 'Path to a custom rule table',
    })
    .option('observed-at', {
      type: 'boolean',
      default: classification.includeObservedAt,
      describe: 'Add an observed_at timestamp to every issue',
    })
    .command(
      'classify [messages] [owner_kind] [owner_name]',
      'Classify event messages into structured issues (JSON)',
      (y) =>
        y
          .positional('messages', { type: 'string', default: '', describe: 'Newline-joined event messages' })
          .positional('owner_kind', { type: 'string', default: '', describe: 'Owner kind, e.g. Deployment' })
          .positional('owner_name', { type: 'string', default: '', describe: 'Owner name' }),
      (args) => {
        const issues = classifyMessages(
          {
            messages: args.messages,
            ownerKind: args.owner_kind,
            ownerName: args.owner_name,
            namespace: args.namespace,
            context: args.context,
          },
          loadRuleTable(args.rules),
          { includeObservedAt: args['observed-at'] },
        );
        write(`${serializeIssues(issues)}\n`);
      },
    )
    .command(
      'next-steps [messages] [owner_kind] [owner_name]',
      'List the suggested next steps for event messages',
      (y) =>
        y
          .positional('messages', { type: 'string', default: '' })
          .positional('owner_kind', { type: 'string', default: '' })
          .positional('owner_name', { type: 'string', default: '' }),
      (args) => {
        const steps = recommendNextSteps(
          {
            messages: args.messages,
            ownerKind: args.owner_kind,
            ownerName: args.owner_name,
            namespace: args.namespace,
            context: args.context,
          },
          loadRuleTable(args.rules),
        );
        write(`${steps.join('\n')}\n`);
      },
    )
    .command(
      'scan <owner_kind> <owner_name>',
      'Collect warning events from the cluster and classify them',
      (y) =>
        y
          .positional('owner_kind', { type: 'string', demandOption: true })
          .positional('owner_name', { type: 'string', demandOption: true }),
      async (args) => {
        if (!args.namespace) {
          throw new Error('scan needs a namespace: pass --namespace or set NAMESPACE');
        }

        const events = ClassifierConfig.fromEnvironment().getEventsConfig();

        initKube(args.context || undefined, events.kubeconfigPath);
        logInfo(`Scanning events for ${chalk.bold(`${args.owner_kind}/${args.owner_name}`)} in ${args.namespace}`);

        const lines = await collectWorkloadEvents({
          ownerName: args.owner_name,
          namespace: args.namespace,
          eventType: events.typeFilter,
          limit: events.limit,
        });
        logDebug(`Classifying ${lines.length} event lines`);

        const issues = classifyMessages(
          {
            messages: lines.join('\n'),
            ownerKind: args.owner_kind,
            ownerName: args.owner_name,
            namespace: args.namespace,
            context: args.context,
          },
          loadRuleTable(args.rules),
          { includeObservedAt: args['observed-at'] },
        );
        write(`${serializeIssues(issues)}\n`);
      },
    )
    .demandCommand(1, 'Specify a command: classify, next-steps or scan')
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help()
    .parseAsync();
}
