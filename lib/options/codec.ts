import { BinaryReader, BinaryWriter, WireType } from '@bufbuild/protobuf';
import { WireTypeMismatchError, fromReaderError } from './errors.js';
import { FieldsByNumber, FieldsInTagOrder, Options, OptionsDraft, UnknownField, emptyDraft } from './fields.js';
import type { EnumValue } from './enums.js';
import { readTag, skipValue } from './wire.js';

// Freezes a draft into an immutable Options value.
export function freeze(draft: OptionsDraft): Options {
	Object.freeze(draft.include);
	Object.freeze(draft.exclude);
	draft.unknownFields.forEach(f => Object.freeze(f));
	Object.freeze(draft.unknownFields);
	return Object.freeze(draft);
}

export type OptionsInit = Partial<Options>;

// Builds an Options value in memory.
export function create(init: OptionsInit = {}): Options {
	const { include = [], exclude = [], unknownFields = [], ...scalars } = init;
	const draft: OptionsDraft = {
		...scalars,
		include: [...include],
		exclude: [...exclude],
		unknownFields: unknownFields.map(f => ({ ...f }))
	};
	return freeze(draft);
}

// Decodes an options message.
//
// Unknown-field payloads are views into `bytes`; the returned value must not
// outlive modifications of that buffer. Use `toOwned` to detach it.
//
// String fields are read as UTF-8; invalid sequences become U+FFFD, so such a
// value does not re-encode to its original bytes.
export function decode(bytes: Uint8Array): Options {
	const reader = new BinaryReader(bytes);
	const draft = emptyDraft();
	while (reader.pos < reader.len) {
		const start = reader.pos;
		let no: number;
		let wireType: WireType;
		try {
			[no, wireType] = readTag(reader);
		} catch (err) {
			throw fromReaderError(err, start);
		}

		const field = FieldsByNumber.get(no);
		if (field && field.wireType !== wireType) {
			throw new WireTypeMismatchError(no, field.wireType, wireType, start);
		}
		const at = reader.pos;
		try {
			if (field) {
				field.decode(reader, draft);
			} else {
				skipValue(reader, no, wireType);
				draft.unknownFields.push({ no, wireType, data: bytes.subarray(at, reader.pos) });
			}
		} catch (err) {
			throw fromReaderError(err, at);
		}
	}
	return freeze(draft);
}

// Encodes an options message. Known fields are written in tag order, unknown
// fields after them in their stored order.
export function encode(options: Options): Uint8Array {
	const writer = new BinaryWriter();
	for (const field of FieldsInTagOrder) {
		field.encode(writer, options);
	}
	for (const { no, wireType, data } of options.unknownFields) {
		writer.tag(no, wireType).raw(data);
	}
	return writer.finish();
}

// Returns a copy that no longer shares memory with the buffer it was decoded from.
export function toOwned(options: Options): Options {
	return create({
		...options,
		unknownFields: options.unknownFields.map(f => ({ ...f, data: f.data.slice() }))
	});
}

function sameEnum(a: EnumValue<number> | undefined, b: EnumValue<number> | undefined): boolean {
	return a === b || (a !== undefined && b !== undefined && a.kind === b.kind && a.value === b.value);
}
function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
	return a.length === b.length && a.every((v, i) => v === b[i]);
}
function sameList<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
	return a.length === b.length && a.every((v, i) => eq(v, b[i]));
}

// Structural equality: presence, values, list order and unknown-field bytes.
export function equals(a: Options, b: Options): boolean {
	for (const field of FieldsInTagOrder) {
		const name = field.name;
		if (name === 'include' || name === 'exclude') continue;
		const x = a[name];
		const y = b[name];
		if (typeof x === 'object' || typeof y === 'object') {
			if (typeof x !== 'object' || typeof y !== 'object' || !sameEnum(x, y)) return false;
		} else if (x !== y) {
			return false;
		}
	}
	return (
		sameList(a.include, b.include, (x, y) => x === y) &&
		sameList(a.exclude, b.exclude, (x, y) => x === y) &&
		sameList(a.unknownFields, b.unknownFields, (x: UnknownField, y: UnknownField) => x.no === y.no && x.wireType === y.wireType && sameBytes(x.data, y.data))
	);
}
