// are-we-dev ships no type declarations of its own.
declare module 'are-we-dev' {
  function isDev(): boolean

  export = isDev
}
