import gp from 'google-protobuf';
import { BinaryReader, WireType } from '@bufbuild/protobuf';
import { Options, WireTypeMismatchError, decode, encode, fromReaderError, readTag, skipValue } from '../options/index.js';

// Definition kind the options are attached to. The message shape is the same at
// every scope; only the generator's reading of it differs.
export type Scope = 'file' | 'message' | 'enum' | 'field';

// Extension number of the options message in each host option message.
export const EXTENSION_FIELD = 1010;

// Host option message that carries the extension at each scope.
export const HostOptionsType: Readonly<Record<Scope, string>> = {
	file: 'google.protobuf.FileOptions',
	message: 'google.protobuf.MessageOptions',
	enum: 'google.protobuf.EnumOptions',
	field: 'google.protobuf.FieldOptions'
};

export interface ScopedOptions {
	readonly scope: Scope;
	readonly options: Options;
}

// Finds the options attached to a host option message, undefined if none are.
// Repeated occurrences of the extension are merged in order.
export function extract(scope: Scope, host: Uint8Array): ScopedOptions | undefined {
	const reader = new BinaryReader(host);
	const bodies: Uint8Array[] = [];
	while (reader.pos < reader.len) {
		const start = reader.pos;
		try {
			const [no, wireType] = readTag(reader);
			if (no !== EXTENSION_FIELD) {
				skipValue(reader, no, wireType);
				continue;
			}
			if (wireType !== WireType.LengthDelimited) {
				throw new WireTypeMismatchError(no, WireType.LengthDelimited, wireType, start);
			}
			bodies.push(reader.bytes());
		} catch (err) {
			throw fromReaderError(err, start);
		}
	}
	if (bodies.length === 0) {
		return undefined;
	}
	if (bodies.length === 1) {
		return { scope, options: decode(bodies[0]) };
	}
	const joined = new Uint8Array(bodies.reduce((n, b) => n + b.length, 0));
	bodies.reduce((offset, b) => {
		joined.set(b, offset);
		return offset + b.length;
	}, 0);
	return { scope, options: decode(joined) };
}

// Appends the options as an extension record to a host option message.
export function embed({ options }: ScopedOptions, host: Uint8Array = new Uint8Array()): Uint8Array {
	const writer = new gp.BinaryWriter();
	writer.writeSerializedMessage(host, 0, host.length);
	writer.writeBytes(EXTENSION_FIELD, encode(options));
	return writer.getResultBuffer();
}
