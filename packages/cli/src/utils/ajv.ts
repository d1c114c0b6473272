// pattern: Functional Core
import { Ajv } from "ajv";
import addErrors from "ajv-errors";
import addFormats from "ajv-formats";

// Singleton AJV instance shared by settings and registry response schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  code: { optimize: true },
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

// Both plugins are CommonJS; under NodeNext the default import is
// module.exports, which carries the plugin again as `.default`
addFormats.default(ajv, ["date-time", "date", "uri", "uri-reference", "regex"]);
addErrors.default(ajv);

export { ajv };
