// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type HostingLogger} from './hosting-logger.js';

/**
 * Hands out one logger per resource, tagged with the resource name.
 */
@injectable()
export class ResourceLoggerService {
  private readonly logger: HostingLogger;
  private readonly loggers: Map<string, HostingLogger> = new Map();

  public constructor(@inject(InjectTokens.HostingLogger) logger?: HostingLogger) {
    this.logger = patchInject(logger, InjectTokens.HostingLogger, this.constructor.name);
  }

  public getLogger(resource: {readonly name: string}): HostingLogger {
    const key: string = resource.name.toLowerCase();
    let logger: HostingLogger | undefined = this.loggers.get(key);
    if (!logger) {
      logger = this.logger.child({resource: resource.name});
      this.loggers.set(key, logger);
    }
    return logger;
  }
}
