export type EventMap = Record<string, unknown>;

export type Unsubscribe = () => void;

export class TypedEmitter<E extends EventMap> {
  private readonly handlers: { [K in keyof E]?: Set<(args: E[K]) => void> } = {};

  on<K extends keyof E>(name: K, handler: (args: E[K]) => void): Unsubscribe {
    const set = this.handlers[name] ?? new Set<(args: E[K]) => void>();
    this.handlers[name] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  emit<K extends keyof E>(name: K, args: E[K]): void {
    const set = this.handlers[name];
    if (!set) return;
    for (const handler of [...set]) handler(args);
  }
}
