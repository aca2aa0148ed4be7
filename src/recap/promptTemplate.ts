const VARIABLE = /\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g

export type TemplateVariables = Record<string, string | number | boolean | null | undefined>

/** Replaces `{{name}}` placeholders; unknown names render as "". */
export function renderTemplate(template: string, variables: TemplateVariables): string {
    return template.replace(VARIABLE, (_match, key: string) => {
        const value = variables[key]
        return value === null || value === undefined ? "" : String(value)
    })
}
