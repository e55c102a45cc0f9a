/**
 * Observability
 *
 * Error and message capture for the engine. Sentry when SENTRY_DSN is set,
 * one JSON line on the console otherwise.
 *
 * Captures are tagged with the tenant and, when one is involved, the work
 * item, so a failure can be traced back to the item it happened on.
 *
 *   initObservability();
 *   captureException(error, { tenantId: "acme", workItemId: "wi-42" });
 */

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

export interface CaptureContext {
  tenantId?: string;
  userId?: string;
  workItemId?: string;
  actionId?: string;
  eventType?: string;
  [key: string]: unknown;
}

/** Context keys indexed as Sentry tags; the rest become extras */
const TAG_KEYS = new Set(["tenantId", "workItemId", "actionId", "eventType"]);

export interface ObservabilityProvider {
  readonly name: string;
  captureException(error: Error, context?: CaptureContext): void;
  captureMessage(message: string, level: ObservabilitySeverity, context?: CaptureContext): void;
  flush(timeoutMs?: number): Promise<void>;
}

/**
 * Tenant and work item named by an action input ("itemId") or an event
 * payload ("workItemId"). Keys that are absent stay absent.
 */
export function subjectTags(value: unknown): Pick<CaptureContext, "tenantId" | "workItemId"> {
  if (typeof value !== "object" || value === null) return {};

  const tags: Pick<CaptureContext, "tenantId" | "workItemId"> = {};
  if ("tenantId" in value && typeof value.tenantId === "string") {
    tags.tenantId = value.tenantId;
  }
  const itemId =
    "workItemId" in value ? value.workItemId : "itemId" in value ? value.itemId : undefined;
  if (typeof itemId === "string") {
    tags.workItemId = itemId;
  }
  return tags;
}

// ---------------------------------------------------------------------------
// Console
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: CaptureContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        stack: error.stack,
        ...context,
      })
    );
  }

  captureMessage(message: string, level: ObservabilitySeverity, context?: CaptureContext): void {
    const line = JSON.stringify({ level, context: "observability", event: "message", message, ...context });
    if (level === "fatal" || level === "error") console.error(line);
    else if (level === "warning") console.warn(line);
    else console.log(line);
  }

  async flush(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// Sentry
// ---------------------------------------------------------------------------

type SentryModule = typeof import("@sentry/node");
type SentryScope = import("@sentry/node").Scope;

/**
 * Loads @sentry/node lazily. Captures made before the module has loaded
 * are dropped.
 */
export class SentryObservabilityProvider implements ObservabilityProvider {
  readonly name = "sentry";
  private sentry: SentryModule | null = null;
  private readonly ready: Promise<void>;

  constructor(dsn: string, environment: string) {
    this.ready = this.load(dsn, environment);
  }

  private async load(dsn: string, environment: string): Promise<void> {
    try {
      const Sentry = await import("@sentry/node");
      Sentry.init({ dsn, environment });
      this.sentry = Sentry;
    } catch (err) {
      console.error(
        "[observability:sentry] Failed to initialize:",
        err instanceof Error ? err.message : err
      );
    }
  }

  private scoped(context: CaptureContext | undefined, capture: (sentry: SentryModule) => void): void {
    const sentry = this.sentry;
    if (!sentry) return;
    sentry.withScope((scope: SentryScope) => {
      for (const [key, value] of Object.entries(context ?? {})) {
        if (value === undefined) continue;
        if (key === "userId") scope.setUser({ id: String(value) });
        else if (TAG_KEYS.has(key)) scope.setTag(key, String(value));
        else scope.setExtra(key, value);
      }
      capture(sentry);
    });
  }

  captureException(error: Error, context?: CaptureContext): void {
    this.scoped(context, (sentry) => sentry.captureException(error));
  }

  captureMessage(message: string, level: ObservabilitySeverity, context?: CaptureContext): void {
    this.scoped(context, (sentry) => sentry.captureMessage(message, level));
  }

  async flush(timeoutMs = 2000): Promise<void> {
    await this.ready;
    if (!this.sentry) return;
    await this.sentry.flush(timeoutMs);
  }
}

// ---------------------------------------------------------------------------
// Module state
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

/** Picks Sentry when SENTRY_DSN is set, the console otherwise. */
export function initObservability(env: Record<string, string | undefined> = process.env): void {
  const dsn = env.SENTRY_DSN;
  if (dsn) {
    provider = new SentryObservabilityProvider(
      dsn,
      env.SENTRY_ENVIRONMENT || env.NODE_ENV || "development"
    );
    console.log("[observability] Initialized with Sentry provider");
  } else {
    provider = new ConsoleObservabilityProvider();
    console.log("[observability] No SENTRY_DSN — using console provider");
  }
}

export function captureException(error: Error, context?: CaptureContext): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: CaptureContext
): void {
  provider.captureMessage(message, level, context);
}

/** Waits for pending captures; call during shutdown. */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
