import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import { ppiPlugin, type PpiPluginOptions } from './plugins/ppi.plugin.ts'
import {
  exportInteractions,
  getInteractions,
  getPartnerCategories,
  getProtein,
  searchProteins,
} from './modules/proteins.controller.ts'

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger']
  ppi: PpiPluginOptions
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true
  })

  await fastify.register(ppiPlugin, options.ppi)

  fastify.get('/health', function (_, reply) {
    reply.send({ status: 'ok' })
  })

  // Raw params/query go straight to the controllers; zod owns validation and defaults.
  fastify.get('/proteins/search', async function (request, reply) {
    const result = await searchProteins(fastify.ppi, request.query)
    if ('status' in result) {
      return reply.status(400).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.get('/proteins/:id', async function (request, reply) {
    const result = await getProtein(fastify.ppi, request.params)
    if ('status' in result) {
      return reply.status(400).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.get('/proteins/:id/categories', async function (request, reply) {
    const result = await getPartnerCategories(fastify.ppi, request.params, request.query)
    if ('status' in result) {
      return reply.status(400).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.get('/proteins/:id/interactions', async function (request, reply) {
    const result = await getInteractions(fastify.ppi, request.params, request.query)
    if ('status' in result) {
      return reply.status(400).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.get('/proteins/:id/interactions.csv', async function (request, reply) {
    const result = await exportInteractions(fastify.ppi, request.params, request.query)
    if ('status' in result) {
      return reply.status(400).send({ error: result.error })
    }
    return reply
      .header('content-type', 'text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="${result.fileName}"`)
      .send(result.body)
  })

  return fastify
}
