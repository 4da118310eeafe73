/**
 * Lotto Activo draw catalog.
 *
 * The number → animal table is validated and frozen once at module load;
 * every lookup after that is a Map read.
 */

import { z } from 'zod'
import animals from './animals.json' with { type: 'json' }

/** Identifier stamped on every record this pipeline produces */
export const DRAW_SOURCE = 'lotto-activo'

const catalogSchema = z
  .record(z.string().regex(/^(?:0|\d{2})$/), z.string().regex(/^[A-Z]+$/))
  .refine(table => new Set(Object.values(table)).size === Object.keys(table).length, {
    message: 'animal labels must be unique',
  })

const table = catalogSchema.parse(animals)

// "0" (Delfín) and "00" (Ballena) are separate draws, so order by value then width
const entries = Object.entries(table).sort(
  ([a], [b]) => Number(a) - Number(b) || a.length - b.length
)

export const ANIMAL_BY_NUMBER: ReadonlyMap<string, string> = new Map(entries)

export const NUMBER_BY_ANIMAL: ReadonlyMap<string, string> = new Map(
  entries.map(([number, animal]) => [animal, number])
)

export const DRAW_NUMBERS: readonly string[] = Object.freeze(entries.map(([number]) => number))

export const ANIMAL_LABELS: readonly string[] = Object.freeze(entries.map(([, animal]) => animal))

export function isDrawNumber(value: string): boolean {
  return ANIMAL_BY_NUMBER.has(value)
}

export function isAnimalLabel(value: string): boolean {
  return NUMBER_BY_ANIMAL.has(value)
}

export function animalForNumber(number: string): string | undefined {
  return ANIMAL_BY_NUMBER.get(number)
}
