/**
 * `{placeholder}` substitution for names, paths and command arguments.
 *
 * @example
 * ```typescript
 * fillTemplate("Database={name}", { name: "ci_main" }); // "Database=ci_main"
 * ```
 * @throws Error on a placeholder with no value, so a typo in the config never
 * reaches a command line
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new Error(`Unknown placeholder {${key}} in "${template}"`);
    }
    return value;
  });
}
