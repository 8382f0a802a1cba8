/**
 * Train Command
 *
 * Train an agent on the configured environment and report the greedy
 * policy's performance after every evaluation interval.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { buildExperiment } from '../../config/buildExperiment.js';
import { trainAndEvaluate } from '../../runner/EpisodeRunner.js';
import { describeError, loadExperimentConfig, parseCount, type ExperimentOptions } from './shared.js';

interface TrainOptions extends ExperimentOptions {
  output: 'json' | 'text';
  verbose?: boolean;
}

export const trainCommand = new Command('train')
  .description('Train an agent and evaluate its greedy policy')
  .requiredOption('-c, --config <path>', 'Experiment file (JSON)')
  .option('-e, --episodes <count>', 'Training episodes (overrides the file)', parseCount)
  .option('-s, --seed <seed>', 'Root random seed (overrides the file)')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .option('-v, --verbose', 'Log every evaluation as it happens')
  .action((options: TrainOptions) => {
    const spinner = ora('Training...').start();

    try {
      const config = loadExperimentConfig(options);
      const { environment, agent, learner } = buildExperiment(config);

      const records = trainAndEvaluate(environment, agent, {
        ...config.training,
        verbose: options.verbose,
        onEvaluation: record => {
          spinner.text = `Training... ${record.episode}/${config.training.episodes} episodes`;
        }
      });
      const stats = learner.getStats();
      spinner.succeed(`Trained for ${config.training.episodes} episodes`);

      if (options.output === 'json') {
        console.log(JSON.stringify({ records, stats }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan('Greedy policy evaluation'));
      console.log(chalk.dim('─'.repeat(48)));
      console.log(chalk.dim('episode'.padStart(8)), chalk.dim('return'.padStart(10)), chalk.dim('steps'.padStart(8)), chalk.dim('completed'.padStart(10)));
      for (const record of records) {
        const color = record.meanReturn >= 0 ? chalk.green : chalk.yellow;
        console.log(
          String(record.episode).padStart(8),
          color(record.meanReturn.toFixed(2).padStart(10)),
          record.meanSteps.toFixed(1).padStart(8),
          `${(record.completionRate * 100).toFixed(0)}%`.padStart(10)
        );
      }
      console.log();
      console.log(chalk.dim('Weights:'), chalk.white(stats.weightCount.toString()));
      console.log(chalk.dim('Updates:'), chalk.white(stats.updates.toString()));
      console.log(chalk.dim('Mean |TD error|:'), chalk.white(stats.meanAbsTdError.toFixed(4)));
      console.log();
    } catch (error) {
      spinner.fail(chalk.red('Training failed'));
      console.error(describeError(error));
      process.exit(1);
    }
  });
