/**
 * Player attribute catalog
 * Maps every attribute to its player_data column and validates the text
 * values written for it
 */

import { z } from 'zod';
import { AppError, ErrorCode } from '../utils/errors';

export enum AttributeType {
  Identity = 'identity',
  Name = 'name',
  Kills = 'kills',
  Deaths = 'deaths',
  GamesPlayed = 'games_played',
  Playtime = 'playtime',
  Experience = 'xp',
  Level = 'level',
  Gems = 'gems',
  Rubies = 'rubies',
}

export interface AttributeDefinition {
  column: string;
  /** Derived from another attribute, never read from or written to storage. */
  computed: boolean;
  schema: z.ZodType<string>;
}

/** Largest value a counter column (PostgreSQL integer) holds. */
export const MAX_COUNTER = 2147483647;

const counter = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .refine(v => Number(v) <= MAX_COUNTER, `must be at most ${MAX_COUNTER}`)
  .transform(v => String(Number(v)));

const playerName = z.string().trim().min(1).max(16);

const uuid = z.string().uuid();

export const ATTRIBUTES: Readonly<Record<AttributeType, AttributeDefinition>> = {
  [AttributeType.Identity]: { column: 'uuid', computed: false, schema: uuid },
  [AttributeType.Name]: { column: 'name', computed: false, schema: playerName },
  [AttributeType.Kills]: { column: 'kills', computed: false, schema: counter },
  [AttributeType.Deaths]: { column: 'deaths', computed: false, schema: counter },
  [AttributeType.GamesPlayed]: { column: 'games_played', computed: false, schema: counter },
  [AttributeType.Playtime]: { column: 'playtime', computed: false, schema: counter },
  [AttributeType.Experience]: { column: 'xp', computed: false, schema: counter },
  [AttributeType.Level]: { column: 'level', computed: true, schema: counter },
  [AttributeType.Gems]: { column: 'gems', computed: false, schema: counter },
  [AttributeType.Rubies]: { column: 'rubies', computed: false, schema: counter },
};

/** The storage column of a stored attribute. Computed attributes have none. */
export function columnOf(attribute: AttributeType): string {
  const definition = ATTRIBUTES[attribute];
  if (definition.computed) {
    throw new AppError(`Attribute ${attribute} is computed and has no column`, ErrorCode.INVALID_INPUT);
  }
  return definition.column;
}

export const playerIdSchema = uuid;

export function isPlayerId(value: string): boolean {
  return playerIdSchema.safeParse(value).success;
}
