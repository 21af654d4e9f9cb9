// The package entry point runs a self-test when it has no CommonJS parent
// (as under ESM), so the library module is imported directly.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdf from 'pdf-parse';
  export default pdf;
}
