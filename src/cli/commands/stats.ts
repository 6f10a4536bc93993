import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { computeStatistics } from '../../statistics/index.js';
import { withRuntime } from '../context.js';
import { formatStatus, header, keyValue } from '../ui.js';
import { RECOMMENDATION_STATUSES } from '../../recommendations/types.js';

export const statsCommand = new Command('stats')
  .description('Summarize recommendations and memories')
  .option('--from <date>', 'First day of the performance trend (YYYY-MM-DD)')
  .option('--to <date>', 'Last day of the performance trend (YYYY-MM-DD)')
  .option('--json', 'Print as JSON')
  .action(async (options) => {
    await withRuntime(async ({ recommendations, memories }) => {
      const stats = computeStatistics(recommendations.entries(), { from: options.from, to: options.to });

      if (options.json) {
        console.log(JSON.stringify({ ...stats, memories: memories.size }, null, 2));
        return;
      }

      console.log(header('Recommendations'));
      console.log(keyValue('Total', String(stats.total)));
      for (const status of RECOMMENDATION_STATUSES) {
        console.log(`  ${formatStatus(status)} ${stats.byStatus[status]}`);
      }
      console.log(keyValue('Avg score', stats.averagePerformanceScore === null ? '-' : stats.averagePerformanceScore.toFixed(2)));
      console.log(keyValue('Liquid rate', stats.liquidFormationRate === null ? '-' : `${Math.round(stats.liquidFormationRate * 100)}%`));

      if (stats.topFormulations.length > 0) {
        console.log(chalk.bold('\nTop formulations'));
        for (const top of stats.topFormulations) {
          console.log(`  ${top.averageScore.toFixed(2).padStart(5)}  ${top.formulation} ${chalk.gray(`(${top.count})`)}`);
        }
      }

      if (stats.performanceTrend.length > 0) {
        console.log(chalk.bold('\nPerformance trend'));
        for (const point of stats.performanceTrend) {
          const rate = `${Math.round(point.liquidFormationRate * 100)}% liquid`;
          console.log(`  ${point.date}  ${point.averagePerformanceScore.toFixed(2).padStart(5)}  ${chalk.gray(`(${point.experimentCount}, ${rate})`)}`);
        }
      }

      console.log(header('Memory'));
      console.log(keyValue('Memories', String(memories.size)));
    });
  });
