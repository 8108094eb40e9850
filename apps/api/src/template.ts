const PLACEHOLDER = /\{([a-z_]+)\}/g;

/** Placeholders each kind of catalog template may use. */
export const TEMPLATE_VARIABLES = {
  hook: ["topic", "niche", "number", "duration"],
  hookOverride: ["hook", "topic"],
  section: ["topic"],
  sectionAudience: ["topic", "audience"],
  point: ["topic"],
  cta: ["topic"],
  series: ["episode", "hook"],
  visual: ["topic", "tone"],
} as const;

export type TemplateKind = keyof typeof TEMPLATE_VARIABLES;

export function placeholders(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (m) => m[1]);
}

/** Names used by the template that the given kind does not provide. */
export function unknownPlaceholders(template: string, kind: TemplateKind): string[] {
  const allowed: readonly string[] = TEMPLATE_VARIABLES[kind];
  return placeholders(template).filter((name) => !allowed.includes(name));
}

// Single pass: substituted values are never re-expanded
export function renderTemplate(
  template: string,
  vars: Readonly<Record<string, string>>,
): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(vars, name)) {
      throw new Error(`template variable "${name}" is not provided`);
    }
    return vars[name];
  });
}
