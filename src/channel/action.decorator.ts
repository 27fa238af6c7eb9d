import type { ActionPayload } from './channel.types';

export type ActionMethod = (payload: ActionPayload) => unknown;

export interface ActionDefinition {
  name: string;
  /** Method looked up on the instance at dispatch, so overrides take effect. */
  propertyKey: string;
  /** Declared arity; when absent the method's own `length` decides. */
  arity?: 0 | 1;
}

export interface ActionOptions {
  /** Wire name of the action; defaults to the method name. */
  name?: string;
  /**
   * 0 for trigger actions, 1 when the handler takes the payload. Needed when
   * the parameter has a default value, which leaves `length` at 0.
   */
  arity?: 0 | 1;
}

/** Names owned by the channel base class; never callable by clients. */
export const RESERVED_NAMES: ReadonlySet<string> = new Set([
  'constructor',
  'subscribed',
  'unsubscribed',
  'subscribeToChannel',
  'unsubscribeFromChannel',
  'performAction',
  'actionMissing',
  'transmit',
  'reject',
  'streamFrom',
  'stopStreamFrom',
  'stopAllStreams',
]);

/** Actions declared directly on a prototype. */
const declared = new WeakMap<object, Map<string, ActionDefinition>>();
/** Merged tables including inherited actions, built on first lookup. */
const resolved = new WeakMap<object, ReadonlyMap<string, ActionDefinition>>();

/**
 * Expose a channel method as a client-invocable action.
 *
 * Pass a string to set only the wire name.
 */
export function Action(options: string | ActionOptions = {}) {
  const { name, arity } = typeof options === 'string' ? { name: options, arity: undefined } : options;
  return <T extends ActionMethod>(
    target: object,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<T>,
  ): void => {
    const actionName = name ?? propertyKey;
    if (RESERVED_NAMES.has(actionName) || RESERVED_NAMES.has(propertyKey)) {
      throw new Error(`${propertyKey} is reserved by Channel and cannot be an action`);
    }
    if (!descriptor.value) {
      throw new Error(`@Action() requires a method, got accessor ${propertyKey}`);
    }

    let table = declared.get(target);
    if (!table) {
      table = new Map();
      declared.set(target, table);
    }
    table.set(actionName, { name: actionName, propertyKey, arity });
  };
}

/** Action table for a channel prototype, subclass declarations taking precedence. */
export function actionsOf(prototype: object): ReadonlyMap<string, ActionDefinition> {
  const cached = resolved.get(prototype);
  if (cached) return cached;

  const chain: object[] = [];
  for (let proto: object | null = prototype; proto && proto !== Object.prototype; proto = Object.getPrototypeOf(proto)) {
    chain.unshift(proto);
  }

  const table = new Map<string, ActionDefinition>();
  for (const proto of chain) {
    for (const [actionName, definition] of declared.get(proto) ?? []) {
      table.set(actionName, definition);
    }
  }
  resolved.set(prototype, table);
  return table;
}
