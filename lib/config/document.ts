import * as fs from 'node:fs';
import JSON5 from 'json5';
import z from 'zod';
import { snakeCase } from 'change-case';
import { WireType } from '@bufbuild/protobuf';
import {
	DescriptorSizeDesc,
	EnumDesc,
	EnumValue,
	FieldDescriptorTypeDesc,
	FieldTypeDesc,
	Fields,
	IntSizeDesc,
	Options,
	TypenameManglingDesc,
	create,
	known
} from '../options/index.js';

export class DocumentError extends Error {
	constructor(public readonly issues: z.ZodIssue[], source?: string) {
		const detail = issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
		super(source ? `${source}: ${detail}` : detail);
		this.name = 'DocumentError';
	}
}

const Int32 = z
	.number()
	.int()
	.min(-0x8000_0000)
	.max(0x7fff_ffff);
const Uint32 = z.number().int().min(0).max(0xffff_ffff);

// Enum values are written as schema names, or as raw numbers which may be undeclared.
function enumOf<E extends number>(desc: EnumDesc<E>) {
	const byName = z.string().transform((name, ctx): EnumValue<E> => {
		const value = desc.parse(name);
		if (value === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected one of ${desc.valueNames.join(', ')}, received '${name}'` });
			return z.NEVER;
		}
		return known(value);
	});
	return byName.or(Int32.transform(n => desc.wrap(n)));
}

const Hex = z
	.string()
	.regex(/^([0-9a-fA-F]{2})*$/, 'Expected an even number of hex digits')
	.transform(s => new Uint8Array(Buffer.from(s, 'hex')));

const UnknownFieldDoc = z
	.object({
		no: z.number().int().min(1).max(0x1fff_ffff),
		wire_type: z.nativeEnum(WireType),
		data: Hex
	})
	.strict();

export const OptionsDocument = z
	.object({
		max_size: Int32,
		max_length: Int32,
		max_count: Int32,
		int_size: enumOf(IntSizeDesc),
		type: enumOf(FieldTypeDesc),
		long_names: z.boolean(),
		packed_struct: z.boolean(),
		packed_enum: z.boolean(),
		skip_message: z.boolean(),
		no_unions: z.boolean(),
		msgid: Uint32,
		anonymous_oneof: z.boolean(),
		proto3: z.boolean(),
		proto3_singular_msgs: z.boolean(),
		enum_to_string: z.boolean(),
		fixed_length: z.boolean(),
		fixed_count: z.boolean(),
		submsg_callback: z.boolean(),
		mangle_names: enumOf(TypenameManglingDesc),
		callback_datatype: z.string(),
		callback_function: z.string(),
		descriptorsize: enumOf(DescriptorSizeDesc),
		default_has: z.boolean(),
		include: z.string().array(),
		exclude: z.string().array(),
		package: z.string(),
		type_override: enumOf(FieldDescriptorTypeDesc),
		sort_by_tag: z.boolean(),
		fallback_type: enumOf(FieldTypeDesc),
		unknown_fields: UnknownFieldDoc.array()
	})
	.partial()
	.strict();
export type OptionsDocument = z.input<typeof OptionsDocument>;

// Accepts camelCase spellings of the schema names, at every level.
function normalizeKeys(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(normalizeKeys);
	}
	if (typeof value !== 'object' || value === null) {
		return value;
	}
	return Object.fromEntries(Object.entries(value).map(([k, v]) => [snakeCase(k), normalizeKeys(v)]));
}

// Validates a parsed document and builds the options it describes.
export function fromDocument(value: unknown, source?: string): Options {
	const result = OptionsDocument.safeParse(normalizeKeys(value));
	if (!result.success) {
		throw new DocumentError(result.error.issues, source);
	}
	const { unknown_fields = [], ...fields } = result.data;
	return create({ ...fields, unknownFields: unknown_fields.map(({ no, wire_type, data }) => ({ no, wireType: wire_type, data })) });
}

export function parseDocument(text: string, source?: string): Options {
	let value: unknown;
	try {
		value = JSON5.parse(text);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new DocumentError([{ code: z.ZodIssueCode.custom, path: [], message }], source);
	}
	return fromDocument(value, source);
}

export function loadDocument(file: string): Options {
	return parseDocument(fs.readFileSync(file, 'utf8'), file);
}

export type DocumentValue = number | boolean | string | string[] | { no: number; wire_type: number; data: string }[];

// Plain-object form of an options value; enum values use their schema names when known.
export function toDocument(options: Options): Record<string, DocumentValue> {
	const doc: Record<string, DocumentValue> = {};
	for (const field of Fields) {
		const name = field.name;
		if (name === 'include' || name === 'exclude') {
			if (options[name].length) doc[name] = [...options[name]];
			continue;
		}
		const value = options[name];
		if (value === undefined) continue;
		if (typeof value === 'object') {
			doc[name] = field.enumDesc?.nameOf(value) ?? value.value;
		} else {
			doc[name] = value;
		}
	}
	if (options.unknownFields.length) {
		doc.unknown_fields = options.unknownFields.map(({ no, wireType, data }) => ({ no, wire_type: wireType, data: Buffer.from(data).toString('hex') }));
	}
	return doc;
}
