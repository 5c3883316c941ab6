import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { parseOrThrow } from '../validation/parse-or-throw';
import {
  getJobsQuerySchema,
  jobIdSchema,
  submitJobBodySchema,
} from '../validation/schemas';
import { JobsService } from './jobs.service';

@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @HttpCode(202)
  @Post()
  async submit(@Body() body: unknown) {
    return this.jobsService.submitJob(parseOrThrow(submitJobBodySchema, body));
  }

  @Get()
  async list(@Query() query: unknown) {
    return this.jobsService.getJobs(parseOrThrow(getJobsQuerySchema, query));
  }

  // Declared before :id so "stats" is not parsed as an id.
  @Get('stats')
  async stats() {
    return this.jobsService.getStats();
  }

  @Get(':id')
  async get(@Param('id') id: unknown) {
    return this.jobsService.getJob(parseOrThrow(jobIdSchema, id));
  }
}
