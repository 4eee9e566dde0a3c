import chalk from 'chalk';

export const symbols = {
  success: '✔',
  warn: '⚠',
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

/** Lightweight render helpers to avoid scattered console.log formatting */
export const render = {
  line(msg = '') {
    console.log(msg);
  },
  success(msg: string) {
    console.log(chalk.green(symbols.success + ' ' + msg));
  },
  warn(msg: string) {
    console.log(chalk.yellow(symbols.warn + ' ' + msg));
  },
  list(values: string[]) {
    values.forEach((v) => console.log('  - ' + chalk.white(v)));
  },
};
