export const DEFAULT_WSDL_PREFIX = 'https://service.sd.dk/sdws/';
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface Config {
  env: string;
  wsdlPrefix: string;
  timeoutMs: number;
}

export function getConfig(): Config {
  const timeout = parseInt(process.env.SD_TIMEOUT_MS ?? '', 10);

  return {
    env: process.env.SD_ENV || 'production',
    wsdlPrefix: process.env.SD_WSDL_PREFIX || DEFAULT_WSDL_PREFIX,
    timeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
  };
}

export function log(message: string, ...args: unknown[]): void {
  const config = getConfig();
  if (config.env === 'dev') {
    console.error(`[sd-connector] ${message}`, ...args);
  }
}

/** Like log(), but written in every environment. */
export function warn(message: string, ...args: unknown[]): void {
  console.warn(`[sd-connector] ${message}`, ...args);
}
