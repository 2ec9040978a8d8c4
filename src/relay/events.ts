import { EventEmitter } from "node:events";
import type { RelayEvent } from "./types.js";

export class RelayEventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  publish(event: RelayEvent): void {
    this.emitter.emit("event", event);
  }

  subscribe(listener: (event: RelayEvent) => void): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }
}
