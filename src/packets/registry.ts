import type { Callback } from "../types/index.js";
import type { WatchPacket } from "./packet.js";
import pino from "pino";

/**
 * Ordered collection of watch packets owned by the engine.
 * Ids are not unique; lookups are "first match" or "all matches" in
 * insertion order.
 *
 * Removal during a sweep goes through `markForRemoval()` + `compact()` so
 * the collection never shifts under an iteration.
 */
export class PacketRegistry {
  private packets: WatchPacket[] = [];
  private pendingRemoval = new Set<WatchPacket>();
  private logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "framewatch.registry",
    });
  }

  add(packet: WatchPacket): void {
    this.packets.push(packet);
    this.logger.debug(
      { id: packet.id, uid: packet.uid, conditions: packet.conditions.length },
      "Packet registered",
    );
  }

  getFirst(id: number): WatchPacket | undefined {
    return this.packets.find((p) => p.id === id);
  }

  getAll(id: number): WatchPacket[] {
    return this.packets.filter((p) => p.id === id);
  }

  removeFirst(id: number): boolean {
    const index = this.packets.findIndex((p) => p.id === id);
    if (index === -1) return false;
    const [removed] = this.packets.splice(index, 1);
    this.logger.debug({ id, uid: removed?.uid }, "Packet removed");
    return true;
  }

  removeAll(id: number): number {
    const before = this.packets.length;
    this.packets = this.packets.filter((p) => p.id !== id);
    const removed = before - this.packets.length;
    if (removed > 0) {
      this.logger.debug({ id, removed }, "Packets removed");
    }
    return removed;
  }

  addCallbackToFirst(id: number, callback: Callback): boolean {
    const packet = this.getFirst(id);
    if (!packet) return false;
    packet.addCallback(callback);
    return true;
  }

  addCallbackToAll(id: number, callback: Callback): number {
    const matches = this.getAll(id);
    for (const packet of matches) {
      packet.addCallback(callback);
    }
    return matches.length;
  }

  setActive(id: number, active: boolean): number {
    const matches = this.getAll(id);
    for (const packet of matches) {
      packet.active = active;
    }
    return matches.length;
  }

  /**
   * Stable copy of the current order, safe to iterate while callbacks
   * add or remove packets.
   */
  snapshot(): WatchPacket[] {
    return [...this.packets];
  }

  contains(packet: WatchPacket): boolean {
    return this.packets.includes(packet);
  }

  markForRemoval(packet: WatchPacket): void {
    this.pendingRemoval.add(packet);
  }

  /**
   * Drop every packet marked for removal, preserving the relative order of
   * the rest. Returns how many were dropped.
   */
  compact(): number {
    if (this.pendingRemoval.size === 0) return 0;
    const before = this.packets.length;
    this.packets = this.packets.filter((p) => !this.pendingRemoval.has(p));
    this.pendingRemoval.clear();
    return before - this.packets.length;
  }

  getAllPackets(): readonly WatchPacket[] {
    return this.packets;
  }

  get totalCount(): number {
    return this.packets.length;
  }

  get activeCount(): number {
    let count = 0;
    for (const p of this.packets) {
      if (p.active) count++;
    }
    return count;
  }

  clear(): void {
    this.packets = [];
    this.pendingRemoval.clear();
  }
}
