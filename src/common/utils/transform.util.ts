// class-transformer helper: symbols and sides are matched upper-case
export const toUpperTrimmed = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;
