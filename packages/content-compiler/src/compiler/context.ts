import { resolveBuildConfig, type BuildConfig, type BuildConfigOverrides } from '../config.js';
import { silentLogger, type Logger } from '../logging.js';
import type { SourceReader } from '../types.js';
import { readSourceFromDisk } from './loader.js';

export interface BuildOptions {
  readonly logger?: Logger;
  readonly readSource?: SourceReader;
}

export interface BuildContext {
  readonly config: BuildConfig;
  readonly logger: Logger;
  readonly readSource: SourceReader;
}

export function createBuildContext(
  overrides: BuildConfigOverrides,
  options: BuildOptions = {},
): BuildContext {
  return {
    config: resolveBuildConfig(overrides),
    logger: options.logger ?? silentLogger,
    readSource: options.readSource ?? readSourceFromDisk,
  };
}
