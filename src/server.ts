import type { FastifyInstance } from 'fastify'
import { contextOptionsFromEnv } from './config/db.ts'
import { loadEnv } from './config/env.ts'
import { buildApp } from './app.ts'

let fastify: FastifyInstance
try {
  const env = loadEnv()
  fastify = await buildApp({
    logger: { level: env.LOG_LEVEL },
    ppi: { open: contextOptionsFromEnv(env) }
  })
  fastify.listen({ host: env.HOST, port: env.PORT }, function (err) {
    if (err) {
      fastify.log.error(err)
      process.exit(1)
    }
  })
} catch (err) {
  console.error('[startup]', err instanceof Error ? err.message : err)
  process.exit(1)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, function () {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error(err)
        process.exit(1)
      }
    )
  })
}
