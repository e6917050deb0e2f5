/**
 * turnweaver: wires the structuring core, the interceptor and the model
 * client together from one validated config.
 *
 * Hosts hand over their collaborators, call `start(registry)` once their
 * generation pipeline is up and `stop()` on shutdown.
 */

import type { Config } from '@turnweaver/shared';
import { loadConfig, type LoadConfigOptions } from './config/loader.js';
import { createLogger, type SecureLogger } from './logging/logger.js';
import { createOpenAIChatClient } from './ai/openai-chat-client.js';
import { StructuredMessageAssembler } from './structuring/assembler.js';
import { createReferenceNormalizer } from './structuring/reference-normalizer.js';
import { createTimeRenderer } from './structuring/time-format.js';
import type {
  BotIdentityCheck,
  ChatContext,
  IdentityResolver,
  MessageStore,
  ReferenceNormalizer,
  StructuredTurn,
  TimeRenderer,
} from './structuring/types.js';
import { InterceptionPolicy } from './interception/policy.js';
import { StructuredTurnInterceptor } from './interception/structured-turn-interceptor.js';
import { StructuredHistoryExtension } from './interception/extension.js';
import type { InterceptorHost, LifecycleResult, StructuredModelClient } from './interception/types.js';

/** What the chat host brings. Time rendering and mention cleanup have defaults. */
export interface HostCollaborators {
  messageStore: MessageStore;
  isBotIdentity: BotIdentityCheck;
  identity?: IdentityResolver;
  normalizeReferences?: ReferenceNormalizer;
  renderTime?: TimeRenderer;
}

export interface TurnWeaverOptions {
  config?: LoadConfigOptions;
  host: HostCollaborators;
  /** Defaults to an OpenAI-compatible client for `config.model` */
  modelClient?: StructuredModelClient;
  /** Defaults to a logger built from `config.logging` */
  logger?: SecureLogger;
  /** Interceptor priority in the host registry */
  priority?: number;
  /** Unix seconds; shared by history queries and the default time renderer */
  clock?: () => number;
}

export class TurnWeaver {
  private readonly config: Config;
  private readonly logger: SecureLogger;
  private readonly assembler: StructuredMessageAssembler;
  private readonly extension: StructuredHistoryExtension;

  constructor(options: TurnWeaverOptions) {
    this.config = loadConfig(options.config);
    this.logger = (options.logger ?? createLogger(this.config.logging)).child({
      component: 'TurnWeaver',
    });

    const { structuring, host } = this.config;
    const collaborators = options.host;
    const clock = options.clock ?? (() => Date.now() / 1000);

    this.assembler = new StructuredMessageAssembler(
      { structuring, host },
      {
        messageStore: collaborators.messageStore,
        logger: this.logger,
        clock,
        render: {
          isBotIdentity: collaborators.isBotIdentity,
          identity: collaborators.identity,
          normalizeReferences:
            collaborators.normalizeReferences ??
            createReferenceNormalizer({
              isBotIdentity: collaborators.isBotIdentity,
              botNickname: host.botNickname,
            }),
          renderTime:
            collaborators.renderTime ??
            createTimeRenderer({ locale: host.timeLocale, timezone: host.timezone, now: clock }),
          botNickname: host.botNickname,
        },
      }
    );

    const interceptor = new StructuredTurnInterceptor({
      policy: new InterceptionPolicy(structuring),
      assembler: this.assembler,
      modelClient: options.modelClient ?? createOpenAIChatClient(this.config.model, this.logger),
      logger: this.logger,
      verbose: structuring.verbose,
    });

    this.extension = new StructuredHistoryExtension(structuring, {
      interceptor,
      logger: this.logger,
      priority: options.priority,
    });

    this.logger.debug('TurnWeaver initialized', {
      environment: this.config.core.environment,
      enabled: structuring.enabled,
      model: this.config.model.model,
    });
  }

  start(host: InterceptorHost): LifecycleResult {
    return this.extension.start(host);
  }

  stop(): LifecycleResult {
    return this.extension.stop();
  }

  /** Structured turns for a prompt, or null when the flat prompt should be used. */
  tryBuildStructuredTurns(context: ChatContext, prompt: string): Promise<StructuredTurn[] | null> {
    return this.assembler.tryBuildStructuredTurns(context, prompt);
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): SecureLogger {
    return this.logger;
  }
}

export function createTurnWeaver(options: TurnWeaverOptions): TurnWeaver {
  return new TurnWeaver(options);
}
