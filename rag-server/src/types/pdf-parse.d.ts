// The package entry point runs a self-test when loaded as an ES module
// dependency; the library file underneath it is the same parser.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";

  export default pdfParse;
}
