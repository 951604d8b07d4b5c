import type { FastifyRequest, FastifyReply } from 'fastify';
import { AccuracyService } from '../services/accuracyService';

export class AccuracyController {
  constructor(private accuracyService: AccuracyService) {}

  async getReport(_request: FastifyRequest, reply: FastifyReply) {
    const report = await this.accuracyService.getReport();
    reply.send({ data: report });
  }
}
