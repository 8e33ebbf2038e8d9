import type { VariableMetaJson } from "./schemas";

export interface VariableMetaFields {
  title?: string;
  description?: string;
  unit?: string;
  shortUnit?: string;
}

/**
 * Metadata describing one column of a table.
 */
export class VariableMeta implements VariableMetaFields {
  title?: string;
  description?: string;
  unit?: string;
  shortUnit?: string;

  constructor(init: VariableMetaFields = {}) {
    this.title = init.title;
    this.description = init.description;
    this.unit = init.unit;
    this.shortUnit = init.shortUnit;
  }

  static fromJSON(json: VariableMetaJson): VariableMeta {
    return new VariableMeta({
      title: json.title ?? undefined,
      description: json.description ?? undefined,
      unit: json.unit ?? undefined,
      shortUnit: json.short_unit ?? undefined,
    });
  }

  toJSON(): VariableMetaJson {
    return {
      title: this.title,
      description: this.description,
      unit: this.unit,
      short_unit: this.shortUnit,
    };
  }

  isEmpty(): boolean {
    return (
      this.title === undefined &&
      this.description === undefined &&
      this.unit === undefined &&
      this.shortUnit === undefined
    );
  }

  equals(other: VariableMeta): boolean {
    return (
      this.title === other.title &&
      this.description === other.description &&
      this.unit === other.unit &&
      this.shortUnit === other.shortUnit
    );
  }
}
