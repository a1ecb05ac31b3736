// bistre ships no type declarations of its own.
declare module 'bistre' {
  interface BistreOptions {
    time?: boolean
  }

  function bistre(options?: BistreOptions): NodeJS.ReadWriteStream

  export = bistre
}
