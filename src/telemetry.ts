type SessionTelemetryBaseEvent = {
  readonly timestamp: string;
  readonly conversationId: string;
};

export type SessionStartedTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "session.started";
  readonly tagCount: number;
  readonly tagSource: string;
  readonly genomeLength: number;
  readonly populationSize: number;
};

export type SessionStoppedTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "session.stopped";
  readonly reason: "requested" | "evolution-failed";
  readonly generations: number;
};

export type EvolutionGenerationTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "evolution.generation";
  readonly generation: number;
  readonly bestScore: number;
  readonly averageScore: number;
  readonly bestGenomeKey: string;
};

export type EvolutionFailedTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "evolution.failed";
  readonly error: string;
};

export type RenderFailedTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "render.failed";
  readonly prompt: string;
  readonly error: string;
};

export type FeedbackFailedTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "feedback.failed";
  readonly error: string;
  readonly genomeKey?: string;
};

export type RatingReceivedTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "rating.received";
  readonly genomeKey: string;
  readonly score: number;
};

export type RatingIgnoredTelemetryEvent = SessionTelemetryBaseEvent & {
  readonly type: "rating.ignored";
  readonly genomeKey: string;
  readonly reason: "no-session" | "shutting-down";
};

export type SessionTelemetryEvent =
  | SessionStartedTelemetryEvent
  | SessionStoppedTelemetryEvent
  | EvolutionGenerationTelemetryEvent
  | EvolutionFailedTelemetryEvent
  | RenderFailedTelemetryEvent
  | FeedbackFailedTelemetryEvent
  | RatingReceivedTelemetryEvent
  | RatingIgnoredTelemetryEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type SessionTelemetryPayload = DistributiveOmit<
  SessionTelemetryEvent,
  keyof SessionTelemetryBaseEvent
>;

export type SessionTelemetrySink = {
  readonly emit: (event: SessionTelemetryEvent) => void | Promise<void>;
  readonly flush?: () => void | Promise<void>;
};

export type SessionTelemetry = {
  readonly emit: (event: SessionTelemetryPayload) => void;
  readonly flush: () => Promise<void>;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export function createSessionTelemetry(
  sink: SessionTelemetrySink | undefined,
  conversationId: string,
): SessionTelemetry {
  const pending = new Set<Promise<void>>();
  const trackPromise = (promise: Promise<void>): void => {
    pending.add(promise);
    void promise.finally(() => {
      pending.delete(promise);
    });
  };

  const emit = (payload: SessionTelemetryPayload): void => {
    if (!sink) {
      return;
    }
    const event: SessionTelemetryEvent = {
      ...payload,
      timestamp: new Date().toISOString(),
      conversationId,
    };
    try {
      const output = sink.emit(event);
      if (isPromiseLike(output)) {
        trackPromise(
          Promise.resolve(output).then(
            () => undefined,
            () => undefined,
          ),
        );
      }
    } catch {
      // Telemetry failures must never break a session.
    }
  };

  const flush = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.allSettled([...pending]);
    }
    if (sink && typeof sink.flush === "function") {
      try {
        await sink.flush();
      } catch {
        // Telemetry failures must never break a session.
      }
    }
  };

  return { emit, flush };
}

const WARNING_EVENTS = new Set<SessionTelemetryEvent["type"]>([
  "render.failed",
  "feedback.failed",
  "rating.ignored",
]);

function formatField(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

export function formatTelemetryEvent(event: SessionTelemetryEvent): string {
  const { type, timestamp, conversationId, ...details } = event;
  const fields = Object.entries(details)
    .map(([key, value]) => `${key}=${formatField(value)}`)
    .join(" ");
  const head = `${timestamp} [tag-breeder] ${type} conversation=${conversationId}`;
  return fields ? `${head} ${fields}` : head;
}

/**
 * Writes one line per event to stderr so stdout stays free for the host
 * application.
 */
export function createConsoleTelemetrySink(): SessionTelemetrySink {
  return {
    emit: (event) => {
      const line = formatTelemetryEvent(event);
      if (WARNING_EVENTS.has(event.type)) {
        console.warn(line);
      } else {
        console.error(line);
      }
    },
  };
}
