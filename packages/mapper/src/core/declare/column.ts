import type { CodecFlags, TypeDescriptor } from "@rowmap/codec"
import type { ColumnDeclaration } from "../../ports/declaration"

/**
 * Immutable builder for one field-to-column declaration.
 * Each modifier returns a new builder.
 */
export class ColumnBuilder {
  constructor(readonly declaration: ColumnDeclaration) {}

  /** Codec flags for this column, overlaid on the table's flags */
  flags(codecFlags: CodecFlags): ColumnBuilder {
    return new ColumnBuilder({
      ...this.declaration,
      codecFlags: { ...this.declaration.codecFlags, ...codecFlags },
    })
  }

  transient(): ColumnBuilder {
    return new ColumnBuilder({ ...this.declaration, transient: true })
  }

  static(): ColumnBuilder {
    return new ColumnBuilder({ ...this.declaration, static: true })
  }
}

export class ColumnStart {
  constructor(
    private readonly family: string,
    private readonly qualifier?: string,
  ) {}

  /** One value per row; reads take the latest version. */
  type(type: TypeDescriptor): ColumnBuilder {
    return this.build({ mode: "single", type })
  }

  /** A `Map<timestamp, value>` history of one column. */
  versions(type: TypeDescriptor): ColumnBuilder {
    return this.build({ mode: "multi_version", type })
  }

  /**
   * An array whose elements are stored one per qualifier across the whole
   * family. `idAccessor` names the element property (or zero-argument
   * method) that yields each element's qualifier.
   */
  list(type: TypeDescriptor, idAccessor: string): ColumnBuilder {
    return this.build({ mode: "list", type, idAccessor })
  }

  private build(
    declaration: Pick<ColumnDeclaration, "mode" | "type" | "idAccessor">,
  ): ColumnBuilder {
    return new ColumnBuilder({
      family: this.family,
      ...(this.qualifier !== undefined && { qualifier: this.qualifier }),
      ...declaration,
    })
  }
}

/**
 * Start a column declaration.
 *
 * @example
 * ```ts
 * fields: {
 *   name: column("main").type(t.string()),
 *   age: column("main", "age_years").type(t.int32()),
 *   prices: column("history", "price").versions(t.float64()),
 *   phones: column("phones").list(t.json("Phone"), "number"),
 * }
 * ```
 */
export function column(family: string, qualifier?: string): ColumnStart {
  return new ColumnStart(family, qualifier)
}
