export type TemplateVars = Record<string, string | number>;

/** Replaces `{name}` placeholders; unknown placeholders are left as written. */
export function fillTemplate(template: string, vars: TemplateVars): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? String(vars[key]) : match
  );
}
