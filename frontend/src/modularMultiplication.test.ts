import { describe, it, expect, beforeEach } from 'vitest'
import { ModularMultiplicationDisplay, formatCaption } from './modularMultiplication'

const NOTHING = { vertices: false, edgePoints: false, connections: false }

describe('ModularMultiplicationDisplay', () => {
  let display: ModularMultiplicationDisplay

  beforeEach(() => {
    display = new ModularMultiplicationDisplay(1200, 1080)
  })

  it('centers the drawing on the canvas', () => {
    expect(display.center).toEqual({ x: 600, y: 600 })
    expect(display.radius).toBe(540)
  })

  it('has no parameters before the first change', () => {
    expect(display.parameters).toBeNull()
    expect(display.isCircle()).toBe(false)
    expect(() => display.getScene()).toThrow('getScene() called before changeParameters()')
  })

  it('computes every stage on the first change', () => {
    expect(display.changeParameters(3, 9, 2, 0)).toEqual({
      vertices: true, edgePoints: true, connections: true,
    })
    const scene = display.getScene()
    expect(scene.edgePoints).toHaveLength(9)
    expect(scene.connections).toHaveLength(9)
    expect(display.parameters).toEqual({ vertexCount: 3, modulus: 9, multiplier: 2, angle: 0 })
  })

  it('does nothing when called twice with the same arguments', () => {
    display.changeParameters(6, 120, 7, 0.4)
    const first = display.getScene()
    expect(display.changeParameters(6, 120, 7, 0.4)).toEqual(NOTHING)
    expect(display.getScene()).toEqual(first)
  })

  it('recomputes connections when a modulus change alters the edge-point count', () => {
    display.changeParameters(4, 8, 3, 0)
    expect(display.changeParameters(4, 12, 3, 0)).toEqual({
      vertices: false, edgePoints: true, connections: true,
    })
    expect(display.getScene().connections).toHaveLength(12)
  })

  it('keeps connections when a modulus change leaves the edge-point count alone', () => {
    display.changeParameters(4, 8, 3, 0)
    const before = display.getScene().connections
    expect(display.changeParameters(4, 9, 3, 0)).toEqual({
      vertices: false, edgePoints: true, connections: false,
    })
    const scene = display.getScene()
    expect(scene.edgePoints).toHaveLength(8)
    expect(scene.connections).toBe(before)
    expect(scene.caption).toBe('Modular multiplication polygon, V=4, M=9, K=3')
  })

  it('recomputes connections when a vertex change alters the edge-point count', () => {
    display.changeParameters(4, 12, 5, 0)
    expect(display.changeParameters(5, 12, 5, 0)).toEqual({
      vertices: true, edgePoints: true, connections: true,
    })
    expect(display.getScene().connections).toHaveLength(10)
  })

  it('keeps connections when a vertex change leaves the edge-point count alone', () => {
    display.changeParameters(3, 12, 5, 0)
    expect(display.changeParameters(4, 12, 5, 0)).toEqual({
      vertices: true, edgePoints: true, connections: false,
    })
  })

  it('only rebuilds connections for a multiplier change', () => {
    display.changeParameters(4, 100, 2, 0)
    expect(display.changeParameters(4, 100, 3, 0)).toEqual({
      vertices: false, edgePoints: false, connections: true,
    })
    expect(display.getScene().connections[1]).toEqual([1, 3])
  })

  it('rebuilds vertices and edge points for an angle change', () => {
    display.changeParameters(4, 100, 2, 0)
    expect(display.changeParameters(4, 100, 2, Math.PI / 4)).toEqual({
      vertices: true, edgePoints: true, connections: false,
    })
    expect(display.parameters?.angle).toBe(Math.PI / 4)
  })

  it('keeps its cache intact when a caller writes to scene points', () => {
    display.changeParameters(4, 4, 2, 0)
    const scene = display.getScene()
    expect(Reflect.set(scene.edgePoints[0], 'x', -1)).toBe(false)
    expect(Reflect.set(scene.connections[1], 1, 3)).toBe(false)
    expect(display.changeParameters(4, 4, 2, 0)).toEqual(NOTHING)
    expect(display.getScene().edgePoints[0]).toEqual({ x: 1140, y: 600 })
    expect(display.getScene().connections[1]).toEqual([1, 2])
  })

  it('renders an empty pattern when modulus < vertexCount', () => {
    display.changeParameters(4, 3, 2, 0)
    const scene = display.getScene()
    expect(scene.edgePoints).toEqual([])
    expect(scene.connections).toEqual([])
    expect(scene.outline.kind).toBe('polygon')
  })

  it('describes a polygon scene', () => {
    display.changeParameters(4, 4, 2, 0)
    expect(display.getScene()).toEqual({
      outline: {
        kind: 'polygon',
        vertices: [
          { x: 1140, y: 600 }, { x: 600, y: 1140 }, { x: 60, y: 600 }, { x: 600, y: 60 },
        ],
      },
      edgePoints: [
        { x: 1140, y: 600 }, { x: 600, y: 1140 }, { x: 60, y: 600 }, { x: 600, y: 60 },
      ],
      connections: [[0, 0], [1, 2], [2, 0], [3, 2]],
      caption: 'Modular multiplication polygon, V=4, M=4, K=2',
    })
  })

  it('describes a circle scene', () => {
    display.changeParameters(50, 100, 2, 0)
    const scene = display.getScene()
    expect(display.isCircle()).toBe(true)
    expect(scene.outline).toEqual({
      kind: 'circle',
      center: { x: 600, y: 600 },
      radius: 540,
      bounds: [{ x: 60, y: 60 }, { x: 1140, y: 1140 }],
    })
    expect(scene.edgePoints).toHaveLength(100)
    expect(scene.caption).toBe('Modular multiplication circle, M=100, K=2')
  })

  it('switches from circle back to polygon', () => {
    display.changeParameters(50, 100, 2, 0)
    display.changeParameters(10, 100, 2, 0)
    const scene = display.getScene()
    expect(scene.outline.kind).toBe('polygon')
    expect(scene.edgePoints).toHaveLength(100)
  })
})

describe('formatCaption', () => {
  it('includes the vertex count only for polygons', () => {
    expect(formatCaption({ vertexCount: 7, modulus: 200, multiplier: 0 }))
      .toBe('Modular multiplication polygon, V=7, M=200, K=0')
    expect(formatCaption({ vertexCount: 50, modulus: 200, multiplier: 0 }))
      .toBe('Modular multiplication circle, M=200, K=0')
  })
})
