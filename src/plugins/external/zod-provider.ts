import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

/**
 * Validates requests and serializes responses with the zod schemas routes declare.
 *
 * @see {@link https://github.com/turkerdev/fastify-type-provider-zod}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)
  },
  {
    name: 'zod-provider',
  },
)
