import { create, decode, encode, freeze } from './codec.js';
import { Fields, Options, OptionsDraft, ScalarName, emptyDraft } from './fields.js';

// Documented default of every field that has one; all other fields are absent.
export const OptionDefaults: Options = (() => {
	const draft = emptyDraft();
	Fields.forEach(f => f.fillDefault(draft));
	return freeze(draft);
})();

// Value a consumer should act on: the stored value, else the field's default.
export function effective<K extends ScalarName>(options: Options, name: K): Options[K] {
	return options[name] ?? OptionDefaults[name];
}

// Copy of `options` with every absent defaulted field filled in.
export function resolve(options: Options): Options {
	const { include, exclude, unknownFields, ...scalars } = options;
	const draft: OptionsDraft = { ...scalars, include: [...include], exclude: [...exclude], unknownFields: [...unknownFields] };
	Fields.forEach(f => f.fillDefault(draft));
	return freeze(draft);
}

// Message merge: scalars set in `overlay` win, lists are concatenated.
export function merge(base: Options, overlay: Options): Options {
	const a = encode(base);
	const b = encode(overlay);
	const joined = new Uint8Array(a.length + b.length);
	joined.set(a);
	joined.set(b, a.length);
	return decode(joined);
}

// Options in effect at the innermost level, e.g. inherit(file, message, field).
export function inherit(...levels: (Options | undefined)[]): Options {
	return levels.reduce<Options>((acc, level) => (level ? merge(acc, level) : acc), create());
}
