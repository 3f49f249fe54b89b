//https://github.com/microsoft/TypeScript/issues/57226
//Only the surface of axe that the toolkit logger touches.
declare module "axe" {
  type LogMethod = (...args: unknown[]) => Promise<void>;

  interface AxeOptions {
    /**
     * The minimum level that reaches the underlying logger.
     *
     * @default 'info'
     */
    level?: string;

    /**
     * Whether or not to invoke logger methods.
     *
     * @default false
     */
    silent?: boolean;

    /**
     * Whether to parse application information (git tag, hash, node version).
     *
     * @default true
     */
    appInfo?: boolean;

    /**
     * Prefix name passed to the underlying logger.
     */
    name?: string | boolean;
  }

  interface AxeInstance {
    trace: LogMethod;
    debug: LogMethod;
    info: LogMethod;
    warn: LogMethod;
    error: LogMethod;
    fatal: LogMethod;
  }

  const Axe: new (config?: AxeOptions) => AxeInstance;

  export default Axe;
}
