import chalk, { type ChalkInstance } from 'chalk';

/** Width of divider lines */
const LINE_WIDTH = 60;

export type Styles = ReturnType<typeof createStyles>;

/**
 * Console styling helpers bound to a chalk instance, so callers can force
 * colour on or off
 */
export function createStyles(c: ChalkInstance = chalk) {
  return {
    success: (text: string) => c.green(`✓ ${text}`),
    error: (text: string) => c.red(`✗ ${text}`),
    info: (text: string) => c.blue(`ℹ ${text}`),
    warn: (text: string) => c.yellow(`⚠ ${text}`),
    dim: (text: string) => c.dim(text),
    label: (label: string, value: string) => `${c.gray(label + ':')} ${c.white(value)}`,
    divider: () => c.gray('─'.repeat(LINE_WIDTH)),
  };
}

export const styles = createStyles();
