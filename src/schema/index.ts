/**
 * Attribute registry
 *
 * @module schema
 */

export { ArffSchema, stripQuotes, type SchemaDeclaration, type SchemaView } from "./schema";
