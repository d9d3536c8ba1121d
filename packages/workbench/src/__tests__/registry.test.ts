import { describe, it, expect, beforeEach } from 'vitest'
import { curveName, fullName, validateCurve } from '@curvelab/curve-core'
import { CurveRegistry } from '../registry.js'
import { isRegistryError } from '../errors.js'

const curve = validateCurve([100, 1000], [80, 85])

function labels(registry: CurveRegistry): string[] {
  return registry.entries().map((e) => fullName(e.name))
}

describe('CurveRegistry', () => {
  let registry: CurveRegistry

  beforeEach(() => {
    registry = new CurveRegistry()
    registry.add(curve, curveName('A'), { id: 'a' })
    registry.add(curve, curveName('B'), { id: 'b' })
    registry.add(curve, curveName('C'), { id: 'c' })
  })

  it('numbers entries by position', () => {
    expect(labels(registry)).toEqual(['1. A', '2. B', '3. C'])
    expect(registry.size).toBe(3)
  })

  it('generates ids when none is given', () => {
    const fresh = new CurveRegistry()
    expect(fresh.add(curve, curveName('x'))).toBe('curve-1')
    expect(fresh.add(curve, curveName('y'))).toBe('curve-2')
  })

  it('inserts at a position and renumbers', () => {
    registry.add(curve, curveName('Top'), { id: 'top', index: 0 })
    expect(labels(registry)).toEqual(['1. Top', '2. A', '3. B', '4. C'])
  })

  it('rejects a duplicate id', () => {
    expect(() => registry.add(curve, curveName('again'), { id: 'a' })).toThrow('A curve with id "a" already exists.')
  })

  it('removes curves and renumbers the rest', () => {
    const removed = registry.remove(['a', 'c'])
    expect(removed.map((e) => e.id)).toEqual(['a', 'c'])
    expect(labels(registry)).toEqual(['1. B'])
  })

  it('checks every id before removing anything', () => {
    try {
      registry.remove(['a', 'zz'])
      expect.unreachable()
    } catch (error) {
      expect(isRegistryError(error, 'UnknownCurve')).toBe(true)
    }
    expect(registry.ids()).toEqual(['a', 'b', 'c'])
  })

  it('moves selected curves up one place', () => {
    registry.moveUp(['a', 'c'])
    expect(registry.ids()).toEqual(['a', 'c', 'b'])
    expect(labels(registry)).toEqual(['1. A', '2. C', '3. B'])
  })

  it('moves selected curves to the top in their current order', () => {
    registry.moveToTop(['c', 'b'])
    expect(registry.ids()).toEqual(['b', 'c', 'a'])
  })

  it('renames and clears suffixes', () => {
    registry.addSuffix(['a'], 'interpolated to 24 ppo')
    expect(fullName(registry.get('a').name)).toBe('1. A - interpolated to 24 ppo')
    registry.rename('a', 'Woofer')
    expect(fullName(registry.get('a').name)).toBe('1. Woofer')
  })

  it('hides and shows curves', () => {
    registry.hide(['b'])
    expect(registry.visibleEntries().map((e) => e.id)).toEqual(['a', 'c'])
    registry.show(['b'])
    expect(registry.visibleEntries().map((e) => e.id)).toEqual(['a', 'b', 'c'])
  })

  it('tracks the reference and forgets it on removal', () => {
    registry.setReference('b')
    expect(registry.reference()?.id).toBe('b')
    registry.remove(['b'])
    expect(registry.reference()).toBeUndefined()
  })

  it('refuses an unknown reference', () => {
    expect(() => registry.setReference('zz')).toThrow('No curve with id "zz".')
  })
})
