/**
 * @trellis-ui/node
 *
 * Node.js host helpers for Trellis: environment configuration, an HTTP remote
 * data source, a stream logger, and descriptor file reloading.
 */

import { type CreateRendererOptions, type Renderer, createRenderer, resolveRendererConfig } from "@trellis-ui/core";
import { type ProcessEnv, rendererConfigFromEnv } from "./config/env.js";
import { type LineSink, type LogFormat, createStreamLogger } from "./logging/streamLogger.js";

export { type ProcessEnv, rendererConfigFromEnv } from "./config/env.js";
export {
  type FetchLike,
  type HttpDataSourceOptions,
  type HttpResponseLike,
  createHttpDataSource,
  requestUrl,
} from "./data/httpDataSource.js";
export {
  type LineSink,
  type LogEntry,
  type LogFormat,
  type StreamLoggerOptions,
  createStreamLogger,
  formatPretty,
  toLogEntry,
} from "./logging/streamLogger.js";
export {
  type DescriptorReloadController,
  type DescriptorReloadLogEvent,
  type DescriptorReloadOptions,
  createDescriptorReload,
  loadDescriptorFile,
} from "./dev/descriptorReload.js";

export type CreateNodeRendererOptions<R> = CreateRendererOptions<R> &
  Readonly<{
    /** Environment consulted for TRELLIS_* settings. Defaults to process.env. */
    env?: ProcessEnv;
    /** Format of the default stream logger. Ignored when `logger` is given. */
    logFormat?: LogFormat;
    /** Stream of the default stream logger. Defaults to process.stderr. */
    logStream?: LineSink;
  }>;

/**
 * Create a renderer session configured from the environment, logging through
 * a stream logger unless a logger is passed.
 */
export function createNodeRenderer<R>(opts: CreateNodeRendererOptions<R>): Renderer<R> {
  const { env, logFormat, logStream, ...rest } = opts;
  const config = rendererConfigFromEnv(env ?? process.env, opts.config ?? {});
  const logger =
    opts.logger ??
    createStreamLogger({
      level: resolveRendererConfig(config).logLevel,
      format: logFormat ?? "pretty",
      ...(logStream === undefined ? {} : { stream: logStream }),
    });
  return createRenderer<R>({ ...rest, config, logger });
}
