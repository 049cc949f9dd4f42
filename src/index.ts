// Concatenative combinator calculus - main exports

//==============================================================================
// Symbols
//==============================================================================

export { Sym, SymbolTable, compareSyms } from "./symbols";

//==============================================================================
// Expressions and Values
//==============================================================================

export type {
  Expr, CallExpr, QuoteExpr, ComposeExpr, IntrinsicExpr, IntrinsicKind,
  Value, ValueStack,
} from "./expr";

export {
  INTRINSICS, INTRINSIC_ARITY, isIntrinsicName, isValue,
  empty, call, quote, intrinsic, sequence, normalize, items, isEmpty,
  exprEquals, valueEquals, stackEquals,
} from "./expr";

//==============================================================================
// Definitions and Context
//==============================================================================

export type { FnDef } from "./definitions";
export { DefinitionStore, fnDef } from "./definitions";

export { Context } from "./context";

export { compressStack } from "./compress";

export { loadDefinitions, loadPrelude, PRELUDE_SOURCE } from "./prelude";

//==============================================================================
// Errors
//==============================================================================

export type { EvalErrorKind, MalformedAssertionReason } from "./errors";
export {
  EvalError, StackUnderflowError, UnboundCallError, TypeMismatchError,
  MalformedAssertionError, StepLimitExceededError,
} from "./errors";

//==============================================================================
// Evaluation
//==============================================================================

export type {
  Configuration, EvalContext, ReduceOptions, ReductionOutcome, StepOutcome,
} from "./evaluate";
export { Evaluator, configuration, configEquals, isTerminal } from "./evaluate";

export type { Assertion, AssertionResult, StepDiscipline } from "./assertion";
export { checkAssertion } from "./assertion";

export type { RecordedTrace, TraceEntry } from "./trace";
export { Trace, trace } from "./trace";

//==============================================================================
// Parsing and Printing
//==============================================================================

export type { ProgramItem } from "./parser";
export {
  parseProgram, parseExpr, parseDefinition, parseAssertion,
  ParseError, highlightCode,
} from "./parser";

export {
  exprToString, stackToString, configToString, defToString, formatError,
} from "./format";

//==============================================================================
// Session
//==============================================================================

export type { CliOptions, DropMode, InterpOptions } from "./config";
export { ConfigError, defaultOptions, parseArgs } from "./config";

export { Interp } from "./interp";
