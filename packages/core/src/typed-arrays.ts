/**
 * Auto-expanding typed array wrapper (ArrayList semantics).
 *
 * @module
 */

export type TypedArray =
	| Int32Array
	| Uint32Array
	| Float32Array
	| Float64Array

export interface TypedArrayConstructor<T extends TypedArray> {
	new (length: number): T
	readonly BYTES_PER_ELEMENT: number
}

/**
 * Initial capacity, in elements.
 */
export const DEFAULT_CAPACITY = 1024

/**
 * `push()` appends elements, doubling capacity as needed.
 */
export class ResizeableTypedArray<TA extends TypedArray> {
	readonly ArrayType: TypedArrayConstructor<TA>
	/** The current backing array. May be longer than `length`. */
	array: TA
	/** Number of items actually stored */
	items = 0

	constructor(
		ArrayType: TypedArrayConstructor<TA>,
		capacity = DEFAULT_CAPACITY,
	) {
		this.ArrayType = ArrayType
		this.array = new ArrayType(Math.max(1, capacity))
	}

	get length() {
		return this.items
	}

	/**
	 * Double the capacity, copying the stored values.
	 */
	expandArray() {
		const next = new this.ArrayType(this.array.length * 2)
		next.set(this.array)
		this.array = next
	}

	/**
	 * Get the value at an index. Handles negative indices.
	 */
	at(index: number): number {
		if (index < -this.length || index >= this.length)
			throw Error(`Index out of bounds: ${index}. Length: ${this.length}`)
		if (index < 0) return this.at(this.length + index)
		const result = this.array[index]
		if (result === undefined) throw Error(`No value at index: ${index}`)
		return result
	}

	/**
	 * Push a value to the end of the array and return its index.
	 */
	push(value: number): number {
		if (this.length >= this.array.length) this.expandArray()
		this.array[this.items++] = value
		return this.length - 1
	}

	/**
	 * Overwrite an existing value.
	 */
	set(index: number, value: number) {
		if (index < 0 || index >= this.length)
			throw Error(`Index out of bounds: ${index}. Length: ${this.length}`)
		this.array[index] = value
	}

}
