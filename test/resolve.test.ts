import { describe, expect, it } from 'vitest';
import { WireType } from '@bufbuild/protobuf';
import {
	DescriptorSize,
	FieldType,
	IntSize,
	OptionDefaults,
	TypenameMangling,
	create,
	decode,
	effective,
	inherit,
	known,
	merge,
	resolve,
	unrecognized
} from '../lib/options/index.js';

describe('effective', () => {
	it('falls back to the field default when absent', () => {
		const options = create();
		expect(effective(options, 'long_names')).toBe(true);
		expect(effective(options, 'sort_by_tag')).toBe(true);
		expect(effective(options, 'packed_struct')).toBe(false);
		expect(effective(options, 'callback_datatype')).toBe('pb_callback_t');
		expect(effective(options, 'callback_function')).toBe('pb_default_field_callback');
	});

	it('uses field-specific defaults for the same enum type', () => {
		const options = create();
		expect(effective(options, 'type')).toEqual(known(FieldType.Default));
		expect(effective(options, 'fallback_type')).toEqual(known(FieldType.Callback));
		expect(effective(options, 'int_size')).toEqual(known(IntSize.Default));
		expect(effective(options, 'mangle_names')).toEqual(known(TypenameMangling.None));
		expect(effective(options, 'descriptorsize')).toEqual(known(DescriptorSize.Auto));
	});

	it('returns undefined for fields without a default', () => {
		const options = create();
		expect(effective(options, 'max_size')).toBeUndefined();
		expect(effective(options, 'msgid')).toBeUndefined();
		expect(effective(options, 'package')).toBeUndefined();
		expect(effective(options, 'type_override')).toBeUndefined();
	});

	it('prefers the stored value', () => {
		const options = create({ long_names: false, fallback_type: unrecognized(11) });
		expect(effective(options, 'long_names')).toBe(false);
		expect(effective(options, 'fallback_type')).toEqual(unrecognized(11));
	});

	it('does not change decode results', () => {
		const options = decode(new Uint8Array());
		effective(options, 'long_names');
		expect(options.long_names).toBeUndefined();
	});
});

describe('resolve', () => {
	it('fills every defaulted field and keeps the rest', () => {
		const resolved = resolve(create({ max_size: 8, proto3: true, include: ['a.h'] }));
		expect(resolved.max_size).toBe(8);
		expect(resolved.proto3).toBe(true);
		expect(resolved.long_names).toBe(true);
		expect(resolved.default_has).toBe(false);
		expect(resolved.fallback_type).toEqual(known(FieldType.Callback));
		expect(resolved.max_count).toBeUndefined();
		expect(resolved.include).toEqual(['a.h']);
	});

	it('lists the documented defaults', () => {
		expect(OptionDefaults.long_names).toBe(true);
		expect(OptionDefaults.sort_by_tag).toBe(true);
		expect(OptionDefaults.submsg_callback).toBe(false);
		expect(OptionDefaults.max_length).toBeUndefined();
		expect(Object.isFrozen(OptionDefaults)).toBe(true);
	});
});

describe('merge', () => {
	it('lets the overlay win for scalars and appends lists', () => {
		const base = create({ max_size: 10, long_names: false, include: ['a.h'] });
		const overlay = create({ max_size: 20, include: ['b.h'], exclude: ['c.h'] });
		const merged = merge(base, overlay);
		expect(merged.max_size).toBe(20);
		expect(merged.long_names).toBe(false);
		expect(merged.include).toEqual(['a.h', 'b.h']);
		expect(merged.exclude).toEqual(['c.h']);
	});

	it('concatenates unknown fields', () => {
		const a = create({ unknownFields: [{ no: 500, wireType: WireType.Varint, data: new Uint8Array([1]) }] });
		const b = create({ unknownFields: [{ no: 500, wireType: WireType.Varint, data: new Uint8Array([2]) }] });
		expect(merge(a, b).unknownFields.map(f => [...f.data])).toEqual([[1], [2]]);
	});
});

describe('inherit', () => {
	it('applies file, message and field levels in order', () => {
		const file = create({ long_names: false, max_size: 32, include: ['common.h'] });
		const message = create({ max_size: 16, type: known(FieldType.Static) });
		const field = create({ type: known(FieldType.Pointer) });
		const result = inherit(file, message, field);
		expect(result.long_names).toBe(false);
		expect(result.max_size).toBe(16);
		expect(result.type).toEqual(known(FieldType.Pointer));
		expect(result.include).toEqual(['common.h']);
	});

	it('skips missing levels', () => {
		const result = inherit(undefined, create({ msgid: 7 }), undefined);
		expect(result.msgid).toBe(7);
		expect(result.max_size).toBeUndefined();
	});
});
