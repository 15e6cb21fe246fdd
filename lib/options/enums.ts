// Value of an enumeration field. Numbers the enum does not declare are kept as-is.
export type EnumValue<E extends number> =
	| { readonly kind: 'known'; readonly value: E }
	| { readonly kind: 'unrecognized'; readonly value: number };

export function known<E extends number>(value: E): EnumValue<E> {
	const v: EnumValue<E> = { kind: 'known', value };
	return Object.freeze(v);
}
export function unrecognized<E extends number>(value: number): EnumValue<E> {
	const v: EnumValue<E> = { kind: 'unrecognized', value };
	return Object.freeze(v);
}

export enum FieldType {
	// Automatically decide field type, generate static field if possible.
	Default = 0,
	// Always generate a callback field.
	Callback = 1,
	// Always generate a dynamically allocated field.
	Pointer = 4,
	// Generate a static field or raise an exception if not possible.
	Static = 2,
	// Ignore the field completely.
	Ignore = 3,
	// Legacy option, use the separate 'fixed_length' option instead.
	Inline = 5
}

export enum IntSize {
	Default = 0,
	Int8 = 8,
	Int16 = 16,
	Int32 = 32,
	Int64 = 64
}

export enum TypenameMangling {
	None = 0,
	StripPackage = 1,
	Flatten = 2,
	PackageInitials = 3
}

export enum DescriptorSize {
	Auto = 0,
	Words1 = 1,
	Words2 = 2,
	Words4 = 4,
	Words8 = 8
}

// Host schema field types, as used by `type_override`.
export enum FieldDescriptorType {
	Double = 1,
	Float = 2,
	Int64 = 3,
	Uint64 = 4,
	Int32 = 5,
	Fixed64 = 6,
	Fixed32 = 7,
	Bool = 8,
	String = 9,
	Group = 10,
	Message = 11,
	Bytes = 12,
	Uint32 = 13,
	Enum = 14,
	Sfixed32 = 15,
	Sfixed64 = 16,
	Sint32 = 17,
	Sint64 = 18
}

// EnumDesc maps the numbers of a closed enumeration to their schema names.
export class EnumDesc<E extends number> {
	private readonly byNumber = new Map<number, E>();
	private readonly names = new Map<number, string>();
	private readonly byName = new Map<string, E>();

	constructor(values: Readonly<Record<string, E>>) {
		for (const [name, value] of Object.entries(values)) {
			this.byNumber.set(value, value);
			this.names.set(value, name);
			this.byName.set(name, value);
		}
	}

	// Wraps a raw number read from the wire.
	wrap(n: number): EnumValue<E> {
		const value = this.byNumber.get(n);
		return value === undefined ? unrecognized<E>(n) : known(value);
	}

	// Schema name of a value, undefined for unrecognized numbers.
	nameOf(v: EnumValue<E>): string | undefined {
		return v.kind === 'known' ? this.names.get(v.value) : undefined;
	}

	parse(name: string): E | undefined {
		return this.byName.get(name);
	}

	get valueNames(): string[] {
		return [...this.byName.keys()];
	}
}

export const FieldTypeDesc = new EnumDesc({
	FT_DEFAULT: FieldType.Default,
	FT_CALLBACK: FieldType.Callback,
	FT_POINTER: FieldType.Pointer,
	FT_STATIC: FieldType.Static,
	FT_IGNORE: FieldType.Ignore,
	FT_INLINE: FieldType.Inline
});
export const IntSizeDesc = new EnumDesc({
	IS_DEFAULT: IntSize.Default,
	IS_8: IntSize.Int8,
	IS_16: IntSize.Int16,
	IS_32: IntSize.Int32,
	IS_64: IntSize.Int64
});
export const TypenameManglingDesc = new EnumDesc({
	M_NONE: TypenameMangling.None,
	M_STRIP_PACKAGE: TypenameMangling.StripPackage,
	M_FLATTEN: TypenameMangling.Flatten,
	M_PACKAGE_INITIALS: TypenameMangling.PackageInitials
});
export const DescriptorSizeDesc = new EnumDesc({
	DS_AUTO: DescriptorSize.Auto,
	DS_1: DescriptorSize.Words1,
	DS_2: DescriptorSize.Words2,
	DS_4: DescriptorSize.Words4,
	DS_8: DescriptorSize.Words8
});
export const FieldDescriptorTypeDesc = new EnumDesc({
	TYPE_DOUBLE: FieldDescriptorType.Double,
	TYPE_FLOAT: FieldDescriptorType.Float,
	TYPE_INT64: FieldDescriptorType.Int64,
	TYPE_UINT64: FieldDescriptorType.Uint64,
	TYPE_INT32: FieldDescriptorType.Int32,
	TYPE_FIXED64: FieldDescriptorType.Fixed64,
	TYPE_FIXED32: FieldDescriptorType.Fixed32,
	TYPE_BOOL: FieldDescriptorType.Bool,
	TYPE_STRING: FieldDescriptorType.String,
	TYPE_GROUP: FieldDescriptorType.Group,
	TYPE_MESSAGE: FieldDescriptorType.Message,
	TYPE_BYTES: FieldDescriptorType.Bytes,
	TYPE_UINT32: FieldDescriptorType.Uint32,
	TYPE_ENUM: FieldDescriptorType.Enum,
	TYPE_SFIXED32: FieldDescriptorType.Sfixed32,
	TYPE_SFIXED64: FieldDescriptorType.Sfixed64,
	TYPE_SINT32: FieldDescriptorType.Sint32,
	TYPE_SINT64: FieldDescriptorType.Sint64
});
