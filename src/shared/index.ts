export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	attempt,
} from "./result.js";

export {
	ErrorKind,
	BinomialError,
	InvalidTypeError,
	DomainError,
	ConfigError,
	isBinomialError,
	isInvalidTypeError,
	isDomainError,
	isConfigError,
	describeValue,
} from "./errors.js";

export { type BinomialConfig, DEFAULT_CONFIG, configFromEnv, resolveConfig } from "./config.js";
