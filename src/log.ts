export type LogFn = (message: string) => void;

export function log(message: string, source = 'haulgrade'): void {
  const formattedTime = new Date().toLocaleTimeString('en-US', {
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });
  console.log(`${formattedTime} [${source}] ${message}`);
}

export function createLog(source: string): LogFn {
  return message => log(message, source);
}

export const silent: LogFn = () => {};
