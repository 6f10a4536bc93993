import chalk from 'chalk';
import { initProject, findProjectRoot } from '../../config/index.js';
import { success, exitWithError } from '../ui.js';

export async function initCommand(options: { force?: boolean }): Promise<void> {
  const cwd = process.cwd();
  const existing = findProjectRoot(cwd);

  if (existing && existing !== cwd && !options.force) {
    console.log(chalk.yellow(`Note: already inside a project rooted at ${existing}`));
  }

  try {
    const fmPath = initProject(cwd, options.force ?? false);

    console.log(success(`Initialized formulation-memory in ${fmPath}`));
    console.log();
    console.log(chalk.bold('Next steps:'));
    console.log(chalk.cyan('  fm config set model.provider openai') + chalk.gray('    choose a language model'));
    console.log(chalk.cyan('  fm rec create --material cellulose --hba "Choline chloride" --hbd Urea --ratio 1:2 --confidence 0.7 "Dissolve cellulose"'));
    console.log(chalk.cyan('  fm feedback submit <id> --solubility 6.5') + chalk.gray('   record the experiment'));
    console.log(chalk.cyan('  fm mcp') + chalk.gray('                                   serve the tools over MCP'));
  } catch (error) {
    exitWithError(error);
  }
}
