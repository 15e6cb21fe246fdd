import { WireType } from '@bufbuild/protobuf';

export type DecodeErrorKind = 'TruncatedInput' | 'MalformedVarint' | 'WireTypeMismatch' | 'InvalidTag';

// Structural failure while decoding. Decoding never returns a partial value.
export abstract class DecodeError extends Error {
	abstract readonly kind: DecodeErrorKind;

	constructor(message: string, public readonly offset: number) {
		super(`${message} (at byte ${offset})`);
		this.name = new.target.name;
	}
}

// A length-delimited payload or varint runs past the end of the buffer.
export class TruncatedInputError extends DecodeError {
	readonly kind = 'TruncatedInput';
}

// A varint has no terminating byte within 10 bytes.
export class MalformedVarintError extends DecodeError {
	readonly kind = 'MalformedVarint';
}

// Field number 0, a reserved wire type, or an end-group without its start.
export class InvalidTagError extends DecodeError {
	readonly kind = 'InvalidTag';
}

export class WireTypeMismatchError extends DecodeError {
	readonly kind = 'WireTypeMismatch';

	constructor(public readonly tag: number, public readonly expected: WireType, public readonly actual: WireType, offset: number) {
		super(`Field ${tag} expects wire type ${WireType[expected]}, got ${WireType[actual] ?? actual}`, offset);
	}
}

// Translates a failure of the wire reader into the matching DecodeError.
// Tags, reserved wire types and skipped values are checked by `readTag` and
// `skipValue`; what remains from the reader is a bounds failure (RangeError
// "premature EOF") or a known-field varint over 10 bytes (Error "invalid varint").
export function fromReaderError(err: unknown, offset: number): DecodeError {
	if (err instanceof DecodeError) {
		return err;
	}
	if (err instanceof RangeError) {
		return new TruncatedInputError('Unexpected end of input', offset);
	}
	return new MalformedVarintError('Invalid varint encoding', offset);
}
