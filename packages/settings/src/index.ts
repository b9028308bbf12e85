export {
	validateSchema,
	extractDefaults,
	extractDefaultsFromSchemas,
	findSetting,
	resolveSettings,
	valueSchemaFor,
	settingSchema,
	categorySchema,
} from './schema'
export { RENDER_SCHEMA } from './renderSchema'

export type { Setting, Category, SettingValue } from './schema'
