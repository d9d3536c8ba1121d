/**
 * Ordered collection of named curves.
 *
 * Position matters: each entry's name prefix is its 1-based position, and
 * derived curves are inserted next to their source or at the top. Every
 * structural change renumbers the prefixes.
 */

import {
  addSuffix as appendSuffix,
  clearSuffixes,
  withBase,
  withPrefix,
  type Curve,
  type CurveId,
  type CurveName,
} from '@curvelab/curve-core'
import { RegistryError } from './errors.js'

export interface CurveEntry {
  readonly id: CurveId
  readonly curve: Curve
  readonly name: CurveName
  readonly visible: boolean
}

interface AddOptions {
  id?: CurveId
  /** Insert position; appends when omitted. */
  index?: number
}

export class CurveRegistry {
  private items: CurveEntry[] = []
  private referenceId: CurveId | undefined
  private nextId = 1

  get size(): number {
    return this.items.length
  }

  entries(): readonly CurveEntry[] {
    return [...this.items]
  }

  visibleEntries(): readonly CurveEntry[] {
    return this.items.filter((entry) => entry.visible)
  }

  ids(): CurveId[] {
    return this.items.map((entry) => entry.id)
  }

  has(id: CurveId): boolean {
    return this.items.some((entry) => entry.id === id)
  }

  get(id: CurveId): CurveEntry {
    const entry = this.items.find((e) => e.id === id)
    if (!entry) throw new RegistryError('UnknownCurve', `No curve with id "${id}".`, [id])
    return entry
  }

  indexOf(id: CurveId): number {
    const index = this.items.findIndex((e) => e.id === id)
    if (index === -1) throw new RegistryError('UnknownCurve', `No curve with id "${id}".`, [id])
    return index
  }

  add(curve: Curve, name: CurveName, options: AddOptions = {}): CurveId {
    const id = options.id ?? this.generateId()
    if (this.has(id)) throw new RegistryError('DuplicateCurve', `A curve with id "${id}" already exists.`, [id])

    const index = Math.min(Math.max(options.index ?? this.items.length, 0), this.items.length)
    this.items.splice(index, 0, { id, curve, name, visible: true })
    this.reindex()
    return id
  }

  /** Removes the given curves; all ids are checked before anything is removed. */
  remove(ids: readonly CurveId[]): CurveEntry[] {
    this.assertKnown(ids)
    const selected = new Set(ids)
    const removed = this.items.filter((e) => selected.has(e.id))
    this.items = this.items.filter((e) => !selected.has(e.id))
    if (this.referenceId !== undefined && selected.has(this.referenceId)) this.referenceId = undefined
    this.reindex()
    return removed
  }

  /** Moves each selected curve one place up, past an unselected neighbour. */
  moveUp(ids: readonly CurveId[]): void {
    this.assertKnown(ids)
    const selected = new Set(ids)
    for (let i = 1; i < this.items.length; i++) {
      const current = this.items[i]
      const above = this.items[i - 1]
      if (selected.has(current.id) && !selected.has(above.id)) {
        this.items[i - 1] = current
        this.items[i] = above
      }
    }
    this.reindex()
  }

  /** Moves the selected curves to the top, keeping their relative order. */
  moveToTop(ids: readonly CurveId[]): void {
    this.assertKnown(ids)
    const selected = new Set(ids)
    this.items = [
      ...this.items.filter((e) => selected.has(e.id)),
      ...this.items.filter((e) => !selected.has(e.id)),
    ]
    this.reindex()
  }

  /** New base name; suffixes describing earlier processing are dropped. */
  rename(id: CurveId, base: string): void {
    this.update([id], (entry) => ({ ...entry, name: withBase(clearSuffixes(entry.name), base) }))
  }

  addSuffix(ids: readonly CurveId[], suffix: string): void {
    this.update(ids, (entry) => ({ ...entry, name: appendSuffix(entry.name, suffix) }))
  }

  hide(ids: readonly CurveId[]): void {
    this.update(ids, (entry) => ({ ...entry, visible: false }))
  }

  show(ids: readonly CurveId[]): void {
    this.update(ids, (entry) => ({ ...entry, visible: true }))
  }

  setReference(id: CurveId): void {
    this.get(id)
    this.referenceId = id
  }

  clearReference(): void {
    this.referenceId = undefined
  }

  reference(): CurveEntry | undefined {
    return this.referenceId === undefined ? undefined : this.get(this.referenceId)
  }

  private update(ids: readonly CurveId[], change: (entry: CurveEntry) => CurveEntry): void {
    this.assertKnown(ids)
    const selected = new Set(ids)
    this.items = this.items.map((entry) => (selected.has(entry.id) ? change(entry) : entry))
  }

  private assertKnown(ids: readonly CurveId[]): void {
    const unknown = ids.filter((id) => !this.has(id))
    if (unknown.length > 0) {
      throw new RegistryError('UnknownCurve', `No curve with id ${unknown.map((id) => `"${id}"`).join(', ')}.`, unknown)
    }
  }

  private generateId(): CurveId {
    let id = `curve-${this.nextId++}`
    while (this.has(id)) id = `curve-${this.nextId++}`
    return id
  }

  private reindex(): void {
    this.items = this.items.map((entry, i) => ({ ...entry, name: withPrefix(entry.name, String(i + 1)) }))
  }
}
