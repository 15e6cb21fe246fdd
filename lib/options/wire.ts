import { BinaryReader, WireType } from '@bufbuild/protobuf';
import { InvalidTagError, MalformedVarintError } from './errors.js';

// Longest varint encoding of a 64-bit value.
export const MAX_VARINT_BYTES = 10;

// Wire types by their number in a tag; 6 and 7 are reserved.
const WireTypes: readonly WireType[] = [
	WireType.Varint,
	WireType.Bit64,
	WireType.LengthDelimited,
	WireType.StartGroup,
	WireType.EndGroup,
	WireType.Bit32
];

// Reads a record tag, rejecting field number 0 and the reserved wire types.
export function readTag(reader: BinaryReader): [number, WireType] {
	const start = reader.pos;
	const tag = reader.uint32();
	const no = tag >>> 3;
	const type = tag & 7;
	if (no === 0) {
		throw new InvalidTagError('Field number 0 is not allowed', start);
	}
	if (type >= WireTypes.length) {
		throw new InvalidTagError(`Field ${no} has reserved wire type ${type}`, start);
	}
	return [no, WireTypes[type]];
}

// Skips the value of a record whose tag has been read. Groups are skipped up to
// the end-group tag with the same field number, nested groups included.
export function skipValue(reader: BinaryReader, no: number, wireType: WireType): void {
	const start = reader.pos;
	switch (wireType) {
		case WireType.Varint:
			reader.skip(wireType);
			if (reader.pos - start > MAX_VARINT_BYTES) {
				throw new MalformedVarintError(`Varint of field ${no} is longer than ${MAX_VARINT_BYTES} bytes`, start);
			}
			return;
		case WireType.StartGroup:
			for (;;) {
				const at = reader.pos;
				const [inner, innerType] = readTag(reader);
				if (innerType === WireType.EndGroup) {
					if (inner !== no) {
						throw new InvalidTagError(`End of group ${inner} inside group ${no}`, at);
					}
					return;
				}
				skipValue(reader, inner, innerType);
			}
		case WireType.EndGroup:
			throw new InvalidTagError(`End of group ${no} without its start`, start);
		default:
			reader.skip(wireType);
	}
}
