// bole ships no type declarations of its own.
declare module 'bole' {
  namespace bole {
    type Level = 'debug' | 'info' | 'warn' | 'error'

    interface Logger {
      debug(...args: unknown[]): void
      info(...args: unknown[]): void
      warn(...args: unknown[]): void
      error(...args: unknown[]): void
    }

    interface OutputSpec {
      level: Level
      stream: NodeJS.WritableStream
    }

    function output(spec: OutputSpec | OutputSpec[]): typeof bole
    function reset(): typeof bole
  }

  function bole(name: string): bole.Logger

  export = bole
}
