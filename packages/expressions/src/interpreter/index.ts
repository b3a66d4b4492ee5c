export { Interpreter, looseEquals } from './interpreter';
export type { InterpreterOptions } from './interpreter';
