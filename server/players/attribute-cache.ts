import { AttributeType } from './attribute-types';

/**
 * Write-through mirror of attribute values. Never authoritative; the sync
 * code only writes to it.
 */
export interface AttributeCacheMirror {
  update(playerId: string, attribute: AttributeType, value: string): Promise<void>;
}

/**
 * Process-local mirror keyed by (player, attribute).
 */
export class InMemoryAttributeCache implements AttributeCacheMirror {
  private entries = new Map<string, Map<AttributeType, string>>();

  async update(playerId: string, attribute: AttributeType, value: string): Promise<void> {
    let player = this.entries.get(playerId);
    if (!player) {
      player = new Map();
      this.entries.set(playerId, player);
    }
    player.set(attribute, value);
  }

  get(playerId: string, attribute: AttributeType): string | undefined {
    return this.entries.get(playerId)?.get(attribute);
  }

  size(): number {
    return this.entries.size;
  }
}
