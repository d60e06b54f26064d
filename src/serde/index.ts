export { serializeDecimal, stringifyJson } from "./serialize.js";
export {
	type DeserializeError,
	EXPECTING,
	describeShape,
	deserializeDecimal,
} from "./deserialize.js";
export { decimalSchema, parseJson } from "./json.js";
