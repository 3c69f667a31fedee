/** treelox runtime type names (Number, String, Boolean, Nil) */
export type LoxTypeName = 'number' | 'string' | 'boolean' | 'nil';
