import { EditSession } from "./edit-session";
import { resolveSessionOptions, type EditSessionOptions } from "./options";

/**
 * Open sessions keyed by document id. Each registry is independent; nothing
 * is shared between registries or between the sessions they hold.
 */
export class SessionRegistry {
  private sessions = new Map<string, EditSession>();
  private readonly defaults: EditSessionOptions;

  /** Throws `SessionOptionsError` when `defaults` are invalid. */
  constructor(defaults: EditSessionOptions = {}) {
    resolveSessionOptions(defaults);
    this.defaults = { ...defaults };
  }

  /** Opens `id` with fresh state, replacing any session already under it. */
  open(
    id: string,
    content = "",
    options: EditSessionOptions = {},
  ): EditSession {
    const session = new EditSession(content, this.withDefaults(options));
    this.sessions.set(id, session);
    return session;
  }

  /** Per-document options over the defaults; `undefined` keeps a default. */
  private withDefaults(options: EditSessionOptions): EditSessionOptions {
    const defaults = this.defaults;
    return {
      viewportLines: options.viewportLines ?? defaults.viewportLines,
      scrollMargin: options.scrollMargin ?? defaults.scrollMargin,
      maxHistory: options.maxHistory ?? defaults.maxHistory,
      groupingIntervalMs:
        options.groupingIntervalMs ?? defaults.groupingIntervalMs,
      clock: options.clock ?? defaults.clock,
      onChange: options.onChange ?? defaults.onChange,
      onSelectionChange: options.onSelectionChange ?? defaults.onSelectionChange,
    };
  }

  get(id: string): EditSession | null {
    return this.sessions.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  close(id: string): boolean {
    return this.sessions.delete(id);
  }

  ids(): string[] {
    return Array.from(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Ids of sessions whose content differs from their last save. */
  modifiedIds(): string[] {
    const ids: string[] = [];
    for (const [id, session] of this.sessions) {
      if (session.isModified()) {
        ids.push(id);
      }
    }
    return ids;
  }
}
