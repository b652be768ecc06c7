export type CellValue = string | number | boolean | Date | null;

export type ColumnType = "integer" | "float" | "text" | "boolean" | "datetime";

type TypedColumn<TType extends ColumnType, TValue> = {
  name: string;
  type: TType;
  values: (TValue | null)[];
};

export type IntegerColumn = TypedColumn<"integer", number>;
export type FloatColumn = TypedColumn<"float", number>;
export type TextColumn = TypedColumn<"text", string>;
export type BooleanColumn = TypedColumn<"boolean", boolean>;
export type DateTimeColumn = TypedColumn<"datetime", Date>;

export type NumericColumn = IntegerColumn | FloatColumn;

export type Column = IntegerColumn | FloatColumn | TextColumn | BooleanColumn | DateTimeColumn;

/**
 * Column-oriented table. Every column holds exactly `rowCount` values and
 * column names are unique; the column order is the header order.
 */
export type Dataset = {
  columns: Column[];
  rowCount: number;
};

export type Row = CellValue[];
