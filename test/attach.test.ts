import { describe, expect, it } from 'vitest';
import { EXTENSION_FIELD, HostOptionsType, InvalidTagError, MalformedVarintError, TruncatedInputError, WireTypeMismatchError, create, embed, equals, extract } from '../lib/index.js';

const bytes = (...b: number[]) => new Uint8Array(b);

describe('embed', () => {
	it('appends the options after the host fields', () => {
		// FieldOptions.packed = true
		const host = bytes(0x10, 0x01);
		const out = embed({ scope: 'field', options: create({ max_size: 64 }) }, host);
		expect(out).toEqual(bytes(0x10, 0x01, 0x92, 0x3f, 0x02, 0x08, 0x40));
	});

	it('creates a host message when none is given', () => {
		expect(embed({ scope: 'file', options: create({ long_names: false }) })).toEqual(bytes(0x92, 0x3f, 0x02, 0x20, 0x00));
	});
});

describe('extract', () => {
	it('finds the options between other host fields', () => {
		const found = extract('field', bytes(0x10, 0x01, 0x92, 0x3f, 0x02, 0x08, 0x40, 0x18, 0x01));
		expect(found?.scope).toBe('field');
		expect(found?.options.max_size).toBe(64);
	});

	it('merges repeated occurrences in order', () => {
		const found = extract('message', bytes(0x92, 0x3f, 0x02, 0x08, 0x40, 0x92, 0x3f, 0x04, 0x08, 0x20, 0x20, 0x00));
		expect(found?.options.max_size).toBe(32);
		expect(found?.options.long_names).toBe(false);
	});

	it('returns undefined when nothing is attached', () => {
		expect(extract('message', bytes(0x10, 0x01))).toBeUndefined();
		expect(extract('enum', bytes())).toBeUndefined();
	});

	it('reverses embed', () => {
		const options = create({ include: ['x.h'], msgid: 12 });
		const found = extract('enum', embed({ scope: 'enum', options }, bytes(0x10, 0x01)));
		expect(found && equals(found.options, options)).toBe(true);
	});

	it('rejects the extension with a scalar wire type', () => {
		expect(() => extract('file', bytes(0x90, 0x3f, 0x01))).toThrow(WireTypeMismatchError);
	});

	it('rejects an over-long varint in a host field', () => {
		expect(() => extract('file', bytes(0x10, ...new Array<number>(10).fill(0x80), 0x00))).toThrow(MalformedVarintError);
	});

	it('rejects a host group closed by another field number', () => {
		expect(() => extract('file', bytes(0x1b, 0x24))).toThrow(InvalidTagError);
	});

	it('rejects truncated host bytes', () => {
		expect(() => extract('file', bytes(0x92, 0x3f, 0x05, 0x08))).toThrow(TruncatedInputError);
	});
});

describe('scopes', () => {
	it('uses one extension number for every host message', () => {
		expect(EXTENSION_FIELD).toBe(1010);
		expect(HostOptionsType).toEqual({
			file: 'google.protobuf.FileOptions',
			message: 'google.protobuf.MessageOptions',
			enum: 'google.protobuf.EnumOptions',
			field: 'google.protobuf.FieldOptions'
		});
	});
});
