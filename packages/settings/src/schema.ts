import { z } from 'zod'

import { loggers } from '@glyphline/logger'

const log = loggers.settings.withTag('schema')

export type SettingValue = boolean | number | string

const settingValueSchema = z.union([z.boolean(), z.number(), z.string()])

/**
 * Schema for validating individual setting definitions.
 */
export const settingSchema = z
	.object({
		id: z.string().min(1),
		type: z.enum(['boolean', 'number', 'string']),
		default: settingValueSchema,
		description: z.string().optional(),
		min: z.number().optional(),
		max: z.number().optional(),
		options: z.array(z.string()).optional(),
	})
	.refine((setting) => typeof setting.default === setting.type, {
		message: 'default does not match the declared type',
		path: ['default'],
	})

export type Setting = z.infer<typeof settingSchema>

/**
 * Schema for validating category definitions (recursive).
 */
export const categorySchema: z.ZodType<Category> = z.lazy(() =>
	z.object({
		id: z.string().min(1),
		label: z.string(),
		settings: z.array(settingSchema).optional(),
		children: z.array(categorySchema).optional(),
	})
)

export type Category = {
	id: string
	label: string
	settings?: Setting[]
	children?: Category[]
}

/**
 * Validates a schema JSON file. Throws if invalid.
 */
export function validateSchema(json: unknown): Category {
	return categorySchema.parse(json)
}

/**
 * Extracts all default values from a category tree.
 * Returns flat key-value map: { "render.text.tabWidth": 4, ... }
 */
export function extractDefaults(
	category: Category,
	prefix = ''
): Record<string, SettingValue> {
	const result: Record<string, SettingValue> = {}
	const path = prefix ? `${prefix}.${category.id}` : category.id

	for (const setting of category.settings ?? []) {
		result[`${path}.${setting.id}`] = setting.default
	}

	for (const child of category.children ?? []) {
		Object.assign(result, extractDefaults(child, path))
	}

	return result
}

export function extractDefaultsFromSchemas(
	schemas: Category[]
): Record<string, SettingValue> {
	const result: Record<string, SettingValue> = {}
	for (const schema of schemas) {
		Object.assign(result, extractDefaults(schema))
	}
	return result
}

/**
 * Finds a setting by its dot-notation key in the category tree.
 */
export function findSetting(
	categories: Category[],
	key: string
): Setting | undefined {
	const parts = key.split('.')

	function search(nodes: Category[], depth: number): Setting | undefined {
		const node = nodes.find((n) => n.id === parts[depth])
		if (!node) return undefined

		if (depth === parts.length - 2) {
			const settingId = parts[parts.length - 1]
			return node.settings?.find((s) => s.id === settingId)
		}

		return node.children ? search(node.children, depth + 1) : undefined
	}

	return search(categories, 0)
}

/**
 * Builds the validator for values assigned to `setting`.
 */
export function valueSchemaFor(setting: Setting): z.ZodType<SettingValue> {
	switch (setting.type) {
		case 'boolean':
			return z.boolean()
		case 'number': {
			let schema = z.number().finite()
			if (setting.min !== undefined) schema = schema.min(setting.min)
			if (setting.max !== undefined) schema = schema.max(setting.max)
			return schema
		}
		case 'string': {
			const options = setting.options
			if (!options?.length) return z.string()
			return z
				.string()
				.refine((value) => options.includes(value), {
					message: `expected one of ${options.join(', ')}`,
				})
		}
	}
}

/**
 * Applies user overrides on top of the schema defaults. Unknown keys and
 * values that fail validation are logged and leave the default in place.
 */
export function resolveSettings(
	categories: Category[],
	overrides: Record<string, unknown> = {}
): Record<string, SettingValue> {
	const result = extractDefaultsFromSchemas(categories)

	for (const [key, value] of Object.entries(overrides)) {
		const setting = findSetting(categories, key)
		if (!setting) {
			log.warn(`ignoring unknown setting "${key}"`)
			continue
		}

		const parsed = valueSchemaFor(setting).safeParse(value)
		if (!parsed.success) {
			log.warn(`ignoring invalid value for "${key}"`, {
				value,
				issues: parsed.error.issues.map((issue) => issue.message),
			})
			continue
		}

		result[key] = parsed.data
	}

	return result
}
