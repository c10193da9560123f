export * from "./SelectableSequence.js";
export * from "./errors.js";
export { dump, type DumpOptions } from "./dump.js";
export { init, type Module, type InitArgs } from "./module.js";
export { indexSchema } from "./schema.js";
