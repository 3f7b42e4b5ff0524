import fp from 'fastify-plugin';
import { createImageLabeler } from '../services/imageLabeler.js';
import type { ImageLabeler } from '../services/imageLabeler.js';

export interface ImageLabelerPluginOptions {
  /** Use this labeler instead of the one built from `config.aws`. */
  labeler?: ImageLabeler;
}

// Type augmentation: makes fastify.imageLabeler available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    imageLabeler: ImageLabeler;
  }
}

export default fp<ImageLabelerPluginOptions>(
  async function imageLabelerPlugin(fastify, options) {
    if (!options.labeler && !fastify.config.imageAnalysisEnabled) {
      fastify.log.warn('AWS credentials or bucket not configured; image analysis is disabled');
    }

    fastify.decorate('imageLabeler', options.labeler ?? createImageLabeler(fastify.config.aws));
  },
  {
    name: 'image-labeler',
    dependencies: ['config'],
  },
);
