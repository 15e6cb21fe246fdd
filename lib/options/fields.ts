import { BinaryReader, BinaryWriter, WireType } from '@bufbuild/protobuf';
import {
	DescriptorSize,
	DescriptorSizeDesc,
	EnumDesc,
	EnumValue,
	FieldDescriptorType,
	FieldDescriptorTypeDesc,
	FieldType,
	FieldTypeDesc,
	IntSize,
	IntSizeDesc,
	TypenameMangling,
	TypenameManglingDesc,
	known
} from './enums.js';

// A record whose tag is not in the field table, kept verbatim.
// `data` is everything that followed the tag: the varint, the fixed-width value,
// the length prefix with its payload, or the group body with its end tag.
export interface UnknownField {
	readonly no: number;
	readonly wireType: WireType;
	readonly data: Uint8Array;
}

// Options for the native code generator. Applies to a field, or to every field of
// the enclosing message or file when attached there.
export interface Options {
	/** Allocated size for `bytes` and `string` fields, including the null terminator of strings. */
	readonly max_size?: number;
	/** Maximum length for `string` fields. Equivalent to `max_size` of length + 1. */
	readonly max_length?: number;
	/** Allocated number of entries in arrays (`repeated` fields). */
	readonly max_count?: number;
	/** Size of integer fields. */
	readonly int_size?: EnumValue<IntSize>;
	/** Force type of field (callback or static allocation). */
	readonly type?: EnumValue<FieldType>;
	/** Use long names for enums, i.e. EnumName_EnumValue. */
	readonly long_names?: boolean;
	/** Add 'packed' attribute to generated structs. */
	readonly packed_struct?: boolean;
	/** Add 'packed' attribute to generated enums. */
	readonly packed_enum?: boolean;
	readonly skip_message?: boolean;
	/** Generate oneof fields as normal optional fields instead of union. */
	readonly no_unions?: boolean;
	/** Integer type tag for a message. */
	readonly msgid?: number;
	readonly anonymous_oneof?: boolean;
	/** Proto3 singular field does not generate a "has_" flag. */
	readonly proto3?: boolean;
	readonly proto3_singular_msgs?: boolean;
	/** Generate an enum->string mapping function. */
	readonly enum_to_string?: boolean;
	readonly fixed_length?: boolean;
	readonly fixed_count?: boolean;
	/** Generate a message-level callback called before decoding submessages. */
	readonly submsg_callback?: boolean;
	/** Shorten or remove package names from type names. File level only. */
	readonly mangle_names?: EnumValue<TypenameMangling>;
	/** Data type for storage associated with callback fields. */
	readonly callback_datatype?: string;
	/** Callback function used for encoding and decoding. */
	readonly callback_function?: string;
	/** Size of field descriptors. Message level only. */
	readonly descriptorsize?: EnumValue<DescriptorSize>;
	/** Default value for has_ fields. */
	readonly default_has?: boolean;
	/** Extra files to include in the generated header. */
	readonly include: readonly string[];
	/** Automatic includes to exclude from the generated header. */
	readonly exclude: readonly string[];
	/** Package name that applies only to the generated code. */
	readonly package?: string;
	/** Override type of the field in generated code. */
	readonly type_override?: EnumValue<FieldDescriptorType>;
	/** Order struct members by tag number instead of declaration order. */
	readonly sort_by_tag?: boolean;
	/** Conversion strategy for FT_DEFAULT fields that cannot be static. */
	readonly fallback_type?: EnumValue<FieldType>;
	readonly unknownFields: readonly UnknownField[];
}

// Mutable form used while a value is being built.
export type OptionsDraft = {
	-readonly [K in keyof Options]: Options[K] extends readonly (infer U)[] | undefined ? U[] : Options[K];
};

export type RepeatedName = 'include' | 'exclude';
export type ScalarName = Exclude<keyof Options, RepeatedName | 'unknownFields'>;
export type FieldName = ScalarName | RepeatedName;

// FieldCodec reads, writes and defaults one entry of the field table.
// D is the slice of the draft it writes to, V the slice of the value it reads.
export interface FieldCodec<D = OptionsDraft, V = Options> {
	readonly no: number;
	readonly name: FieldName;
	readonly wireType: WireType;
	readonly repeated: boolean;
	readonly enumDesc?: EnumDesc<number>;

	// Reads one record's value; scalars overwrite, repeated fields append.
	decode(reader: BinaryReader, draft: D): void;
	// Writes the stored value(s), nothing when absent.
	encode(writer: BinaryWriter, value: V): void;
	// Stores the documented default when the field is absent.
	fillDefault(draft: D): void;
	has(value: V): boolean;
}

type Slot<K extends string, T> = { [P in K]?: T };

function scalar<K extends ScalarName, T>(
	no: number,
	name: K,
	wireType: WireType,
	read: (r: BinaryReader) => T,
	write: (w: BinaryWriter, v: T) => void,
	def?: T,
	enumDesc?: EnumDesc<number>
): FieldCodec<Slot<K, T>, Slot<K, T>> {
	return {
		no,
		name,
		wireType,
		repeated: false,
		enumDesc,
		decode(reader, draft) {
			draft[name] = read(reader);
		},
		encode(writer, value) {
			const v = value[name];
			if (v !== undefined) {
				writer.tag(no, wireType);
				write(writer, v);
			}
		},
		fillDefault(draft) {
			if (draft[name] === undefined && def !== undefined) {
				draft[name] = def;
			}
		},
		has(value) {
			return value[name] !== undefined;
		}
	};
}

const int32 = <K extends ScalarName>(no: number, name: K) =>
	scalar<K, number>(no, name, WireType.Varint, r => r.int32(), (w, v) => w.int32(v));
const uint32 = <K extends ScalarName>(no: number, name: K) =>
	scalar<K, number>(no, name, WireType.Varint, r => r.uint32(), (w, v) => w.uint32(v));
const bool = <K extends ScalarName>(no: number, name: K, def: boolean) =>
	scalar<K, boolean>(no, name, WireType.Varint, r => r.bool(), (w, v) => w.bool(v), def);
const str = <K extends ScalarName>(no: number, name: K, def?: string) =>
	scalar<K, string>(no, name, WireType.LengthDelimited, r => r.string(), (w, v) => w.string(v), def);
const enumeration = <K extends ScalarName, E extends number>(no: number, name: K, desc: EnumDesc<E>, def?: E) =>
	scalar<K, EnumValue<E>>(
		no,
		name,
		WireType.Varint,
		r => desc.wrap(r.int32()),
		(w, v) => w.int32(v.value),
		def === undefined ? undefined : known(def),
		desc
	);

function repeatedString<K extends RepeatedName>(no: number, name: K): FieldCodec<{ [P in K]: string[] }, { readonly [P in K]: readonly string[] }> {
	return {
		no,
		name,
		wireType: WireType.LengthDelimited,
		repeated: true,
		decode(reader, draft) {
			draft[name].push(reader.string());
		},
		encode(writer, value) {
			for (const item of value[name]) {
				writer.tag(no, WireType.LengthDelimited).string(item);
			}
		},
		fillDefault() {},
		has(value) {
			return value[name].length > 0;
		}
	};
}

// The field table, in schema declaration order.
export const Fields: readonly FieldCodec[] = [
	int32(1, 'max_size'),
	int32(14, 'max_length'),
	int32(2, 'max_count'),
	enumeration(7, 'int_size', IntSizeDesc, IntSize.Default),
	enumeration(3, 'type', FieldTypeDesc, FieldType.Default),
	bool(4, 'long_names', true),
	bool(5, 'packed_struct', false),
	bool(10, 'packed_enum', false),
	bool(6, 'skip_message', false),
	bool(8, 'no_unions', false),
	uint32(9, 'msgid'),
	bool(11, 'anonymous_oneof', false),
	bool(12, 'proto3', false),
	bool(21, 'proto3_singular_msgs', false),
	bool(13, 'enum_to_string', false),
	bool(15, 'fixed_length', false),
	bool(16, 'fixed_count', false),
	bool(22, 'submsg_callback', false),
	enumeration(17, 'mangle_names', TypenameManglingDesc, TypenameMangling.None),
	str(18, 'callback_datatype', 'pb_callback_t'),
	str(19, 'callback_function', 'pb_default_field_callback'),
	enumeration(20, 'descriptorsize', DescriptorSizeDesc, DescriptorSize.Auto),
	bool(23, 'default_has', false),
	repeatedString(24, 'include'),
	repeatedString(26, 'exclude'),
	str(25, 'package'),
	enumeration(27, 'type_override', FieldDescriptorTypeDesc),
	bool(28, 'sort_by_tag', true),
	enumeration(29, 'fallback_type', FieldTypeDesc, FieldType.Callback)
];

export const FieldsByNumber: ReadonlyMap<number, FieldCodec> = new Map(Fields.map(f => [f.no, f]));

// Emission order for encode.
export const FieldsInTagOrder: readonly FieldCodec[] = [...Fields].sort((a, b) => a.no - b.no);

export function emptyDraft(): OptionsDraft {
	return { include: [], exclude: [], unknownFields: [] };
}
