import { Player } from '../../shared/types/game';

/**
 * FIFO waiting line for players not currently seated. Position is the only
 * fairness mechanism: there is no priority beyond order of arrival.
 */
export class PlayerQueue {
  private entries: Player[] = [];

  get length(): number {
    return this.entries.length;
  }

  has(playerId: string): boolean {
    return this.entries.some((p) => p.id === playerId);
  }

  enqueue(player: Player): void {
    this.entries.push(player);
  }

  /**
   * Rotation primitive shared by seat replacement and end-of-round reseeding.
   *
   * The outgoing player (if any) is appended before the head is popped, so a
   * player who just lost a seat always lands behind everyone already waiting.
   * With an otherwise empty queue the outgoing player is returned straight
   * back.
   */
  advance(outgoing: Player | null = null): Player | null {
    if (outgoing) {
      this.entries.push(outgoing);
    }
    return this.entries.shift() ?? null;
  }

  /**
   * Replace the record for `player.id` in place. Returns the queue index, or
   * -1 when the id is not queued.
   */
  replace(player: Player): number {
    const index = this.entries.findIndex((p) => p.id === player.id);
    if (index !== -1) {
      this.entries[index] = player;
    }
    return index;
  }

  /**
   * Splice the player out, preserving the order of everyone else. Returns
   * the removed record or null.
   */
  remove(playerId: string): Player | null {
    const index = this.entries.findIndex((p) => p.id === playerId);
    if (index === -1) {
      return null;
    }
    const [removed] = this.entries.splice(index, 1);
    return removed ?? null;
  }

  clear(): void {
    this.entries = [];
  }

  toArray(): Player[] {
    return this.entries.map((p) => ({ ...p }));
  }
}
