import { DocumentError, loadDocument, toDocument } from './config/document.js';
import { HostOptionsType, Scope, extract } from './attach/scope.js';
import { DecodeError, Options, decode, encode, resolve } from './options/index.js';

const usage = [
	'Usage: nanopb-options <command> [args]',
	'',
	'  encode <file.json5>      Encode an options document, print hex',
	'  decode <hex>             Decode an options message, print JSON',
	'  resolve <hex>            Decode and apply field defaults',
	'  extract <scope> <hex>    Decode the options attached to host option bytes',
	'',
	`Scopes: ${Object.keys(HostOptionsType).join(', ')}`
].join('\n');

class UsageError extends Error {}

function isScope(s: string): s is Scope {
	return Object.hasOwn(HostOptionsType, s);
}

function fromHex(s: string): Uint8Array {
	const hex = s.replace(/\s+/g, '');
	if (!/^([0-9a-fA-F]{2})*$/.test(hex)) {
		throw new UsageError(`Not a hex string: ${s}`);
	}
	return new Uint8Array(Buffer.from(hex, 'hex'));
}

function print(options: Options) {
	console.log(JSON.stringify(toDocument(options), null, '\t'));
}

function dispatch([command, ...args]: string[]) {
	switch (command) {
		case 'encode': {
			if (args.length !== 1) throw new UsageError(usage);
			console.log(Buffer.from(encode(loadDocument(args[0]))).toString('hex'));
			return;
		}
		case 'decode':
		case 'resolve': {
			if (args.length !== 1) throw new UsageError(usage);
			const options = decode(fromHex(args[0]));
			print(command === 'resolve' ? resolve(options) : options);
			return;
		}
		case 'extract': {
			const [scope, hex] = args;
			if (args.length !== 2 || !isScope(scope)) throw new UsageError(usage);
			const found = extract(scope, fromHex(hex));
			if (!found) {
				console.log(`No options attached to ${HostOptionsType[scope]}`);
				return;
			}
			print(found.options);
			return;
		}
		default:
			throw new UsageError(usage);
	}
}

// Runs one command, returns the process exit code.
export function run(argv: string[]): number {
	try {
		dispatch(argv);
		return 0;
	} catch (err) {
		if (err instanceof UsageError || err instanceof DecodeError || err instanceof DocumentError) {
			console.error(err.message);
			return 1;
		}
		throw err;
	}
}
