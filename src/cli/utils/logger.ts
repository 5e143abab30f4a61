/**
 * CLI 专用输出工具。
 *
 * 错误与提示带颜色符号（红色✗/黄色⚠），目标流不是终端或设置了 NO_COLOR 时输出纯文本。
 * 分析结果不经过这里，由命令直接写入输出目标，便于被其他程序读取。
 */

const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
} as const;

type Color = Exclude<keyof typeof ANSI, 'reset'>;

function useColor(stream: NodeJS.WriteStream): boolean {
  return Boolean(stream.isTTY) && process.env.NO_COLOR === undefined;
}

function decorate(symbol: string, message: string, color: Color, stream: NodeJS.WriteStream): string {
  const head = useColor(stream) ? `${ANSI[color]}${symbol}${ANSI.reset}` : symbol;
  return `${head} ${message}`;
}

export function warn(message: string): void {
  console.warn(decorate('⚠', message, 'yellow', process.stderr));
}

export function error(message: string): void {
  console.error(decorate('✗', message, 'red', process.stderr));
}
