/**
 * Inspect Command
 *
 * Train, then roll out the greedy policy once and show the value of every
 * available action at each step.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { buildExperiment } from '../../config/buildExperiment.js';
import { trainAndEvaluate, traceGreedyPolicy } from '../../runner/EpisodeRunner.js';
import { describeError, loadExperimentConfig, parseCount, type ExperimentOptions } from './shared.js';

interface InspectOptions extends ExperimentOptions {
  steps: number;
}

export const inspectCommand = new Command('inspect')
  .description('Train, then trace the greedy policy with per-action values')
  .requiredOption('-c, --config <path>', 'Experiment file (JSON)')
  .option('-e, --episodes <count>', 'Training episodes (overrides the file)', parseCount)
  .option('-s, --seed <seed>', 'Root random seed (overrides the file)')
  .option('-n, --steps <count>', 'Maximum steps to trace', parseCount, 10)
  .action((options: InspectOptions) => {
    const spinner = ora('Training...').start();

    try {
      const config = loadExperimentConfig(options);
      const { environment, agent } = buildExperiment(config);
      trainAndEvaluate(environment, agent, config.training);
      spinner.succeed(`Trained for ${config.training.episodes} episodes`);

      const trace = traceGreedyPolicy(environment, agent, options.steps);

      console.log();
      trace.steps.forEach((step, i) => {
        console.log(chalk.cyan(`${i}`), step.observation.toString());
        for (const { action, value } of step.values) {
          const marker = action.equals(step.chosen) ? chalk.green('→') : ' ';
          console.log(`  ${marker} ${action.key().padEnd(36)} ${value.toFixed(4)}`);
        }
        console.log(chalk.dim(`    reward ${step.reward}`));
      });
      console.log();

      if (trace.looped) {
        console.log(chalk.yellow('Looped; stopped tracing.'));
      } else if (trace.terminated) {
        console.log(chalk.green('Episode ended.'));
      } else {
        console.log(chalk.dim(`Stopped after ${options.steps} steps.`));
      }
    } catch (error) {
      spinner.fail(chalk.red('Inspection failed'));
      console.error(describeError(error));
      process.exit(1);
    }
  });
