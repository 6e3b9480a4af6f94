// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	attempt,
	ErrorKind,
	BinomialError,
	InvalidTypeError,
	DomainError,
	ConfigError,
	isBinomialError,
	isInvalidTypeError,
	isDomainError,
	isConfigError,
	type BinomialConfig,
	DEFAULT_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Lib ──────────────────────────────────────────────────────────────
export {
	type Logger,
	type LogLevel,
	createLogger,
	sharedLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { LibDecimal } from "./lib/decimal/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";

// ── Combinatorics ────────────────────────────────────────────────────
export {
	type IntegerLike,
	factorial,
	combinations,
	isIntegerLike,
	validateNonNegativeInteger,
	validateLessEqual,
	validateProbability,
} from "./combinatorics/index.js";

// ── Distribution ─────────────────────────────────────────────────────
export {
	type BinomialOptions,
	type BinomialParams,
	type BinomialSummary,
	type ProbabilityTable,
	Binomial,
	formatDistribution,
	formatStats,
	toFixedHalfEven,
	binomialParamsSchema,
	parseBinomialParams,
	binomialFromParams,
} from "./distribution/index.js";
