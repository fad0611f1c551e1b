import type { EventListener, ExecutionEvent } from '@ttk91web/core-ttk91';

import type { EventCallback, EventMessage, EventType, ListenerTarget } from './types';

export const EVENT_SCHEMA_VERSION = 1;

export function serializeEvent(event: ExecutionEvent): EventMessage {
  switch (event.kind) {
    case 'supervisor-call':
      return { version: EVENT_SCHEMA_VERSION, type: event.kind, payload: { code: event.code } };
    case 'memory-change':
      return { version: EVENT_SCHEMA_VERSION, type: event.kind, payload: { address: event.address, data: event.data } };
    case 'register-change':
      return { version: EVENT_SCHEMA_VERSION, type: event.kind, payload: { register: event.register, data: event.data } };
    case 'output':
      return { version: EVENT_SCHEMA_VERSION, type: event.kind, payload: { device: event.device, data: event.data } };
  }
}

export function describeEvent(message: EventMessage): string {
  const fields = Object.entries(message.payload)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
  return `${message.type} ${fields}`;
}

interface ListenerEntry {
  target: ListenerTarget;
  callback: EventCallback;
}

// イベント種別ごとのリスナーと、全イベントを受ける "*" リスナーへ配送する。
export class EventRelay implements EventListener {
  private readonly byType = new Map<EventType, ListenerEntry[]>();

  private readonly universal: ListenerEntry[] = [];

  // 配送中の登録/解除は配送が終わるまで保留する。
  private readonly deferred: Array<() => void> = [];

  private depth = 0;

  addListener(target: ListenerTarget, callback: EventCallback): () => void {
    const entry: ListenerEntry = { target, callback };
    this.mutate(() => this.listFor(target).push(entry));
    return () => {
      this.mutate(() => {
        const list = this.listFor(target);
        const index = list.indexOf(entry);
        if (index >= 0) {
          list.splice(index, 1);
        }
      });
    };
  }

  listenerCount(target?: ListenerTarget): number {
    if (target !== undefined) {
      return this.listFor(target).length;
    }
    let count = this.universal.length;
    for (const list of this.byType.values()) {
      count += list.length;
    }
    return count;
  }

  dispatch(event: ExecutionEvent): void {
    const message = serializeEvent(event);
    const specific = this.byType.get(message.type) ?? [];

    this.depth += 1;
    try {
      for (const entry of specific) {
        entry.callback(message);
      }
      for (const entry of this.universal) {
        entry.callback(message);
      }
    } finally {
      this.depth -= 1;
      if (this.depth === 0) {
        for (const change of this.deferred.splice(0)) {
          change();
        }
      }
    }
  }

  event(event: ExecutionEvent): void {
    this.dispatch(event);
  }

  private listFor(target: ListenerTarget): ListenerEntry[] {
    if (target === '*') {
      return this.universal;
    }
    let list = this.byType.get(target);
    if (!list) {
      list = [];
      this.byType.set(target, list);
    }
    return list;
  }

  private mutate(change: () => void): void {
    if (this.depth > 0) {
      this.deferred.push(change);
      return;
    }
    change();
  }
}
