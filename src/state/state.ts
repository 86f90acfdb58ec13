import { z } from "zod";

/**
 * Design views a step can produce. Values in a {@link State} are absolute paths.
 */
export const DESIGN_FORMATS = ["nl", "pnl", "sdc", "def", "odb", "gds"] as const;

export type DesignFormat = (typeof DESIGN_FORMATS)[number];

export const MetricValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

export type MetricValue = z.infer<typeof MetricValueSchema>;

export const StateSchema = z
  .object({
    views: z.record(z.enum(DESIGN_FORMATS), z.string().min(1)).default({}),
    metrics: z.record(z.string(), MetricValueSchema).default({}),
  })
  .strict();

export type StateViews = Readonly<Partial<Record<DesignFormat, string>>>;
export type StateMetrics = Readonly<Record<string, MetricValue>>;

export class StateFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateFormatError";
  }
}

/**
 * Immutable snapshot of the views and metrics a flow has produced so far.
 */
export class State {
  readonly views: StateViews;
  readonly metrics: StateMetrics;

  constructor(input: { views?: StateViews; metrics?: StateMetrics } = {}) {
    this.views = Object.freeze({ ...input.views });
    this.metrics = Object.freeze({ ...input.metrics });
  }

  static empty(): State {
    return new State();
  }

  /** Throws {@link StateFormatError} for text that is not a serialized state. */
  static loads(text: string): State {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new StateFormatError(`invalid JSON (${detail})`);
    }

    const parsed = StateSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => {
        const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
        return `${location}: ${issue.message}`;
      });
      throw new StateFormatError(issues.join("; "));
    }

    return new State(parsed.data);
  }

  dumps(): string {
    return `${JSON.stringify({ views: sortKeys(this.views), metrics: sortKeys(this.metrics) }, null, 2)}\n`;
  }

  equals(other: State): boolean {
    return this.dumps() === other.dumps();
  }

  with(update: { views?: StateViews; metrics?: StateMetrics }): State {
    return new State({
      views: { ...this.views, ...update.views },
      metrics: { ...this.metrics, ...update.metrics },
    });
  }

  view(format: DesignFormat): string | undefined {
    return this.views[format];
  }

  metric(name: string): MetricValue | undefined {
    return this.metrics[name];
  }
}

function sortKeys<T>(record: Readonly<Record<string, T>>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    const value = record[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}
