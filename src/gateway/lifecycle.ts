import { applyEnvOverrides, formatConfigError, loadConfig } from "../config/loader.js";
import type { VerseBotConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { CredentialStore, type Credential } from "../auth/credential-store.js";
import type { InboundEvent, Transport } from "../channels/adapter.js";
import { MatrixTransport } from "../channels/matrix/index.js";
import { Dispatcher } from "../bot/dispatcher.js";
import { SessionState } from "../bot/session-state.js";
import { createProviderGateway, type ProviderGateway } from "../providers/gateway.js";
import type { FetchFn } from "../providers/types.js";
import { loadBookTable } from "../scripture/books.js";
import { PassageCache } from "../scripture/passage-cache.js";
import { ReferenceResolver } from "../scripture/resolver.js";

const SHUTDOWN_TIMEOUT_MS = 10_000;

export interface BotContext {
  readonly config: VerseBotConfig;
  readonly logger: Logger;
  readonly transport: Transport;
  readonly state: SessionState;
  readonly dispatcher: Dispatcher;
  readonly gateway: ProviderGateway;
  readonly cache: PassageCache;
  /** Settles once shutdown has finished. */
  readonly stopped: Promise<void>;
  shutdown(): Promise<void>;
}

export interface StartBotOptions {
  readonly configPath?: string;
  /** Already-loaded config; skips reading configPath. */
  readonly config?: VerseBotConfig;
  readonly logger?: Logger;
  readonly credentialStore?: CredentialStore;
  /** Builds the transport; defaults to the Matrix client. */
  readonly createTransport?: (credential: Credential, config: VerseBotConfig, logger: Logger) => Transport;
  readonly fetchImpl?: FetchFn;
  readonly env?: NodeJS.ProcessEnv;
  readonly handleSignals?: boolean;
}

function readConfig(opts: StartBotOptions): VerseBotConfig {
  if (opts.config) return applyEnvOverrides(opts.config, opts.env);
  try {
    return loadConfig(opts.configPath);
  } catch (err) {
    throw new Error(`Invalid configuration: ${formatConfigError(err)}`, { cause: err });
  }
}

/**
 * Saved credential first; otherwise the MATRIX_ACCESS_TOKEN environment
 * variable together with a homeserver and user id.
 */
export async function resolveCredential(
  store: CredentialStore,
  config: VerseBotConfig,
  env: NodeJS.ProcessEnv,
  logger: Logger,
): Promise<Credential> {
  const saved = await store.load();
  if (saved) return saved;

  const accessToken = env["MATRIX_ACCESS_TOKEN"];
  const homeserver = env["MATRIX_HOMESERVER"] ?? config.matrix.homeserver;
  const userId = env["MATRIX_USER_ID"] ?? config.matrix.userId;
  if (accessToken && homeserver && userId) {
    logger.warn("Using MATRIX_ACCESS_TOKEN; run `versebot auth login` for a device-bound session");
    return { homeserver, userId, accessToken };
  }

  throw new Error(
    "No Matrix credentials found. Run `versebot auth login`, or set MATRIX_ACCESS_TOKEN " +
      "together with MATRIX_HOMESERVER and MATRIX_USER_ID (or matrix.homeserver and matrix.userId in the config).",
  );
}

function matrixTransport(credential: Credential, config: VerseBotConfig, logger: Logger): Transport {
  return new MatrixTransport({
    homeserver: credential.homeserver,
    userId: credential.userId,
    accessToken: credential.accessToken,
    deviceId: credential.deviceId,
    e2ee: config.matrix.e2ee.enabled,
    logger,
  });
}

export async function startBot(opts: StartBotOptions = {}): Promise<BotContext> {
  const env = opts.env ?? process.env;

  // 1. Config and logger
  const config = readConfig(opts);
  const logger = opts.logger ?? createLogger(config.logging);

  // 2. Providers and scripture lookup
  const gateway = createProviderGateway(
    { apiKeys: config.apiKeys, timeoutMs: config.bot.requestTimeoutMs, fetchImpl: opts.fetchImpl },
    logger,
  );
  if (!gateway.supports(config.bot.defaultTranslation)) {
    throw new Error(
      `Unsupported default translation "${config.bot.defaultTranslation}" (supported: ${gateway.translations().join(", ")})`,
    );
  }
  const resolver = new ReferenceResolver({
    books: loadBookTable(),
    defaultTranslation: config.bot.defaultTranslation,
    translations: gateway.translations(),
    detectAnywhere: config.bot.detectReferencesAnywhere,
    unknownBookPolicy: config.bot.unknownBookPolicy,
  });
  const cache = new PassageCache({
    enabled: config.bot.cacheEnabled,
    maxEntries: config.bot.cacheMaxEntries,
    ttlMs: config.bot.cacheTtlMs,
  });

  // 3. Credentials
  const store = opts.credentialStore ?? new CredentialStore(logger);
  const credential = await resolveCredential(store, config, env, logger);
  if (config.matrix.e2ee.enabled && !credential.deviceId) {
    logger.warn("E2EE is enabled but the session has no device id; encrypted rooms will not be readable");
  }

  // 4. Transport; the watermark is taken before the first sync. Events that
  // arrive before the dispatcher exists are held and replayed in order.
  const startedAt = Date.now();
  const abortController = new AbortController();
  const transport = (opts.createTransport ?? matrixTransport)(credential, config, logger);
  const pending: InboundEvent[] = [];
  let dispatch: ((event: InboundEvent) => void) | undefined;

  const onEvent = (event: InboundEvent): void => {
    if (dispatch) dispatch(event);
    else pending.push(event);
  };
  const onError = (err: Error): void => {
    logger.warn({ err }, "Transport error");
  };
  const onDisconnected = (reason?: string): void => {
    logger.info({ reason }, "Transport disconnected");
  };
  transport.events.on("event", onEvent);
  transport.events.on("error", onError);
  transport.events.on("disconnected", onDisconnected);
  const detach = (): void => {
    transport.events.off("event", onEvent);
    transport.events.off("error", onError);
    transport.events.off("disconnected", onDisconnected);
  };
  try {
    await transport.start(abortController.signal);
  } catch (err) {
    detach();
    throw err;
  }

  // 5. Rooms
  const state = new SessionState(
    { rooms: config.matrix.rooms, selfId: transport.userId, startedAt },
    transport,
    logger.child({ component: "rooms" }),
  );
  const rooms = await state.resolveAliases();
  if (rooms.length === 0) logger.warn("No usable rooms configured; the bot will not answer anywhere");
  await state.ensureJoined();

  // 6. Dispatch
  const dispatcher = new Dispatcher(
    { transport, state, resolver, gateway, cache, logger: logger.child({ component: "dispatcher" }) },
    {
      maxMessageLength: config.bot.maxMessageLength,
      splitMessageLength: config.bot.splitMessageLength,
      preservePoetry: config.bot.preservePoetryFormatting,
      e2eeEnabled: config.matrix.e2ee.enabled,
      deviceId: credential.deviceId,
    },
  );
  dispatch = (event) => {
    dispatcher
      .handleEvent(event)
      .then((outcome) => logger.debug({ kind: event.kind, outcome }, "Event handled"))
      .catch((err: unknown) => logger.error({ err, kind: event.kind }, "Event handler failed"));
  };
  if (pending.length > 0) logger.debug({ count: pending.length }, "Replaying events received during startup");
  for (const event of pending.splice(0)) dispatch(event);

  // 7. Graceful shutdown
  let resolveStopped: () => void = () => undefined;
  const stopped = new Promise<void>((resolve) => {
    resolveStopped = resolve;
  });
  let shutdownInProgress = false;

  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return stopped;
    shutdownInProgress = true;
    logger.info("Shutting down...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    abortController.abort();
    try {
      await transport.stop();
    } catch (err) {
      logger.error({ err }, "Error stopping transport");
    }
    detach();
    cache.clear();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
    resolveStopped();
  };

  if (opts.handleSignals ?? true) {
    const onSignal = (): void => {
      shutdown().catch((err: unknown) => logger.error({ err }, "Shutdown failed"));
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }

  logger.info({ userId: transport.userId, rooms: state.rooms.length }, "versebot started");
  return { config, logger, transport, state, dispatcher, gateway, cache, stopped, shutdown };
}
