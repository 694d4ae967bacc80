import path from 'node:path'
import { Router } from 'express'
import swaggerUi from 'swagger-ui-express'
import YAML from 'yamljs'

export interface DocsRouterOptions {
  /** 既定は docs/openapi.yaml */
  documentPath?: string
}

/**
 * OpenAPI 定義を Swagger UI と生の JSON の両方で公開する
 *   GET /docs/              Swagger UI
 *   GET /docs/openapi.json  定義そのもの（クライアント生成用）
 */
export const createDocsRouter = (options: DocsRouterOptions = {}): Router => {
  const documentPath = options.documentPath ?? path.resolve(process.cwd(), 'docs/openapi.yaml')
  const document = YAML.load(documentPath)

  const router = Router()
  router.get('/openapi.json', (_req, res) => {
    res.json(document)
  })
  router.use(
    '/',
    swaggerUi.serve,
    swaggerUi.setup(document, {
      customSiteTitle: 'Behavior Dispatch API',
      swaggerOptions: { tryItOutEnabled: true },
    })
  )
  return router
}
