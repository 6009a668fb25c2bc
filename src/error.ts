// These errors indicate logic bugs in the interpreter, not in the program
// being run. Problems with the program itself are reported as `ParseError`s
// or as runtime error values.
export class UnreachableError extends Error {}
