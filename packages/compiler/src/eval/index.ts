export { Args } from "./args.js";
export * as cast from "./cast.js";
export { DEFAULT_LIMITS, type Engine, type EvalLimits } from "./engine.js";
export { Closure, ElementFunc, Func, NativeFunc, PartialFunc, type CallContext, type FuncKind, type NativeImpl } from "./func.js";
export { evalModule, evalSource, fileErrorToSourceError, importFile } from "./import.js";
export { Library, createLibrary } from "./library.js";
export { Module } from "./module.js";
export { display, repr, valuesEqual } from "./repr.js";
export { Route } from "./route.js";
export { Scope, Scopes } from "./scope.js";
export * from "./value.js";
export { Vm, callFunc, evalRoot } from "./vm.js";
