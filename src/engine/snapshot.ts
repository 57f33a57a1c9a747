import type {ImageRef} from '../types.js'

/** A filesystem diff produced by exactly one step. */
export type Layer = {
  readonly id: string;
  /** 1-based position of the producing step. */
  readonly index: number;
  readonly stepId: string;
}

/** The resolved base image a snapshot starts from. */
export type BaseImage = {
  readonly ref: ImageRef;
  readonly id: string;
}

/**
 * Immutable, ordered composition of a base image and the layers stacked on it.
 *
 * `append()` never touches the receiver: it returns a new snapshot whose layer
 * list is the old one plus the new layer. Layers are frozen on the way in.
 */
export class Snapshot {
  static fromBase(base: BaseImage): Snapshot {
    return new Snapshot(Object.freeze({ref: Object.freeze({...base.ref}), id: base.id}), Object.freeze([]))
  }

  private constructor(
    readonly base: BaseImage,
    readonly layers: readonly Layer[]
  ) {}

  /** Id of the active layer: the last one, or the base image itself. */
  get top(): string {
    return this.layers.at(-1)?.id ?? this.base.id
  }

  get depth(): number {
    return this.layers.length
  }

  /**
   * Returns a snapshot with one more layer.
   * @throws If the layer does not come right after the current top
   */
  append(layer: Layer): Snapshot {
    if (layer.index !== this.layers.length + 1) {
      throw new RangeError(`Layer index ${layer.index} does not follow ${this.layers.length}`)
    }

    return new Snapshot(this.base, Object.freeze([...this.layers, Object.freeze({...layer})]))
  }

  equals(other: Snapshot): boolean {
    return this.base.id === other.base.id
      && this.layers.length === other.layers.length
      && this.layers.every((layer, i) => layer.id === other.layers[i].id)
  }

  toJSON(): {base: {image: string; id: string}; layers: Layer[]} {
    return {
      base: {image: `${this.base.ref.name}:${this.base.ref.tag}`, id: this.base.id},
      layers: this.layers.map(l => ({...l}))
    }
  }
}
