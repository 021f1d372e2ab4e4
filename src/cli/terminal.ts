const ESC = '\u001b[';

export const supportsAnsiColor: boolean =
  Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== 'dumb';

function wrap(open: number, close: number): (text: string) => string {
  return (text: string) => (supportsAnsiColor ? `${ESC}${open}m${text}${ESC}${close}m` : text);
}

export const boldText = wrap(1, 22);
export const dimText = wrap(2, 22);
export const cyanText = wrap(36, 39);
