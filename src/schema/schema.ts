/**
 * Attribute registry for an ARFF relation
 *
 * Holds the relation name, the ordered attribute declarations and the
 * optional class attribute. The class attribute, once designated, always
 * occupies the last position. A frozen schema (one already flushed to a
 * stream) rejects every change that would alter its header text.
 *
 * @module schema
 */

import { MISSING } from "../constants";
import { SchemaError } from "../errors";
import type { AttributeData, AttributeSpec, DeclaredKind } from "../types";
import type { AttributeKind } from "../values/types";

type StoredSpec =
  | { name: string; kind: "integer" | "numeric" | "string" }
  | { name: string; kind: "nominal"; values: Set<string> }
  | { name: string; kind: "date"; pattern?: string };

/**
 * Schema declaration entry: a kind keyword, or the allowed values of a
 * nominal attribute
 */
export type SchemaDeclaration = readonly [name: string, data: DeclaredKind | readonly string[]];

const SURROUNDING_QUOTES = /^['"]|['"]$/g;

/**
 * Strip one leading and one trailing quote character
 */
export function stripQuotes(text: string): string {
  return text.replace(SURROUNDING_QUOTES, "");
}

function normalizeKind(kind: DeclaredKind): AttributeKind {
  return kind === "real" ? "numeric" : kind;
}

function buildSpec(name: string, kind: AttributeKind, data: AttributeData | undefined): StoredSpec {
  switch (kind) {
    case "integer":
    case "numeric":
    case "string":
      return { name, kind };
    case "nominal":
      return { name, kind, values: new Set(typeof data === "string" ? [data] : (data ?? [])) };
    case "date":
      return typeof data === "string" ? { name, kind, pattern: data } : { name, kind };
  }
}

function cloneSpec(spec: StoredSpec): StoredSpec {
  return spec.kind === "nominal" ? { ...spec, values: new Set(spec.values) } : { ...spec };
}

/**
 * Read-only view of a schema, as handed out by the dataset that owns it
 */
export type SchemaView = Readonly<
  Pick<
    ArffSchema,
    | "relation"
    | "attributes"
    | "names"
    | "size"
    | "classAttribute"
    | "isFrozen"
    | "has"
    | "attribute"
    | "at"
    | "indexOf"
    | "kindOf"
    | "nominalValues"
    | "sortedNominalValues"
  >
>;

/**
 * Ordered attribute registry
 *
 * @example
 * ```typescript
 * const schema = new ArffSchema("weather", [
 *   ["temperature", "numeric"],
 *   ["play", ["yes", "no"]],
 * ]);
 * schema.setClass("play");
 * ```
 */
export class ArffSchema {
  relation: string;
  private readonly order: string[] = [];
  private readonly specs = new Map<string, StoredSpec>();
  private classAttr: string | undefined;
  private frozen = false;

  constructor(relation = "", declarations: Iterable<SchemaDeclaration> = []) {
    this.relation = relation;
    for (const [rawName, data] of declarations) {
      const name = stripQuotes(rawName);
      if (typeof data === "string") {
        this.defineAttribute(name, data);
      } else {
        this.defineAttribute(name, "nominal", data);
      }
    }
  }

  /** Attribute declarations in schema order */
  get attributes(): readonly AttributeSpec[] {
    return this.order.map((name) => this.require(name));
  }

  /** Attribute names in schema order */
  get names(): readonly string[] {
    return [...this.order];
  }

  get size(): number {
    return this.order.length;
  }

  /** Designated class attribute, if any */
  get classAttribute(): string | undefined {
    return this.classAttr;
  }

  /** Whether the schema has been flushed to a stream */
  get isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  attribute(name: string): AttributeSpec | undefined {
    return this.specs.get(name);
  }

  /** Attribute at a schema position */
  at(index: number): AttributeSpec | undefined {
    const name = this.order[index];
    return name === undefined ? undefined : this.specs.get(name);
  }

  indexOf(name: string): number {
    return this.order.indexOf(name);
  }

  kindOf(name: string): AttributeKind | undefined {
    return this.specs.get(name)?.kind;
  }

  /**
   * Declare a new attribute at the end of schema order. For nominal
   * attributes `data` is the allowed value set; for dates, the Weka pattern.
   *
   * @throws {SchemaError} If the name is taken or the schema is frozen
   */
  defineAttribute(name: string, kind: DeclaredKind, data?: AttributeData): void {
    this.assertMutable(`define attribute "${name}"`);
    if (this.specs.has(name)) {
      throw new SchemaError(`Attribute "${name}" is already defined`, name);
    }
    this.specs.set(name, buildSpec(name, normalizeKind(kind), data));
    this.order.push(name);
    this.normalizeClassPosition();
  }

  /**
   * Add one value to a nominal attribute's set
   *
   * @returns Whether the set grew
   */
  addNominalValue(name: string, value: string): boolean {
    const spec = this.requireNominal(name);
    if (spec.values.has(value)) {
      return false;
    }
    this.assertMutable(`add value "${value}" to nominal attribute "${name}"`);
    spec.values.add(value);
    return true;
  }

  /**
   * Union values into a nominal attribute's set
   */
  setNominalValues(name: string, values: Iterable<string>): void {
    for (const value of values) {
      this.addNominalValue(name, value);
    }
  }

  /**
   * Allowed values of a nominal attribute
   */
  nominalValues(name: string): ReadonlySet<string> {
    return this.requireNominal(name).values;
  }

  /**
   * Record `name` as the class attribute. The first designation is final;
   * designating a different attribute later throws.
   */
  designateClass(name: string): void {
    if (this.classAttr === undefined) {
      if (this.frozen && this.order.length > 0 && this.order[this.order.length - 1] !== name) {
        throw new SchemaError(
          `Cannot designate "${name}" as class attribute while streaming: it is not the last attribute of the flushed header`,
          name
        );
      }
      this.classAttr = name;
    } else if (this.classAttr !== name) {
      throw new SchemaError(
        `Attempting to set class to "${name}" when it has already been set to "${this.classAttr}"`,
        name
      );
    }
  }

  /**
   * Designate an existing attribute as class and move it to the end
   */
  setClass(name: string): void {
    this.require(name);
    this.designateClass(name);
    this.normalizeClassPosition();
  }

  /**
   * Move the class attribute to the end of schema order
   */
  normalizeClassPosition(): void {
    const name = this.classAttr;
    if (name === undefined) return;
    const index = this.order.indexOf(name);
    if (index === -1 || index === this.order.length - 1) return;
    this.assertMutable(`move class attribute "${name}"`);
    this.order.splice(index, 1);
    this.order.push(name);
  }

  /**
   * Sort attribute names alphabetically, keeping the class attribute last
   */
  alphabetize(): void {
    const sorted = [...this.order].sort((a, b) => {
      const aClass = a === this.classAttr ? 1 : 0;
      const bClass = b === this.classAttr ? 1 : 0;
      if (aClass !== bClass) return aClass - bClass;
      return a < b ? -1 : a > b ? 1 : 0;
    });
    if (sorted.every((name, index) => name === this.order[index])) return;
    this.assertMutable("reorder attributes");
    this.order.splice(0, this.order.length, ...sorted);
  }

  /**
   * Freeze the schema; called once its header has been flushed to a stream
   */
  freeze(): void {
    this.frozen = true;
  }

  /**
   * Deep copy. The copy is never frozen.
   */
  copy(): ArffSchema {
    const copy = new ArffSchema(this.relation);
    for (const name of this.order) {
      copy.specs.set(name, cloneSpec(this.require(name)));
      copy.order.push(name);
    }
    copy.classAttr = this.classAttr;
    return copy;
  }

  /**
   * Nominal values as written in a header: sorted, without the missing marker
   */
  sortedNominalValues(name: string): string[] {
    return [...this.requireNominal(name).values].filter((value) => value !== MISSING).sort();
  }

  private require(name: string): StoredSpec {
    const spec = this.specs.get(name);
    if (spec === undefined) {
      throw new SchemaError(`Unknown attribute "${name}"`, name);
    }
    return spec;
  }

  private requireNominal(name: string): Extract<StoredSpec, { kind: "nominal" }> {
    const spec = this.require(name);
    if (spec.kind !== "nominal") {
      throw new SchemaError(`Attribute "${name}" is ${spec.kind}, not nominal`, name);
    }
    return spec;
  }

  private assertMutable(action: string): void {
    if (this.frozen) {
      throw new SchemaError(
        `Cannot ${action}: the schema has already been flushed to an open stream`
      );
    }
  }
}
