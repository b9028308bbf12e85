import renderSchemaJson from './schemas/render.json'
import { validateSchema, type Category } from './schema'

export const RENDER_SCHEMA: Category = validateSchema(renderSchemaJson)
