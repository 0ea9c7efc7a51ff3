import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  StreamableFile,
  ValidationPipe,
} from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildJob } from '../testing/job.factory';
import { CreateJobDto } from './dto/create-job.dto';
import { JobEventsService } from './job-events.service';
import { JobQueueService } from './job-queue.service';
import { JobsController } from './jobs.controller';

const JOB_ID = '0f8fad5b-d9cb-469f-a165-70867728950e';

describe('JobsController', () => {
  let controller: JobsController;
  const jobQueue = {
    addJob: jest.fn(),
    getJob: jest.fn(),
    getAllJobs: jest.fn(),
    getJobsByGroup: jest.fn(),
    getStatistics: jest.fn(),
    cancelJob: jest.fn(),
    pauseJob: jest.fn(),
    resumeJob: jest.fn(),
    retryJob: jest.fn(),
    deleteJob: jest.fn(),
    clearCompletedJobs: jest.fn(),
    clearAllJobs: jest.fn(),
    startQueue: jest.fn(),
    stopQueue: jest.fn(),
    isQueuePaused: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [JobsController],
      providers: [JobEventsService, { provide: JobQueueService, useValue: jobQueue }],
    }).compile();
    controller = moduleRef.get(JobsController);
  });

  it('creates a job and returns its id', async () => {
    jobQueue.addJob.mockResolvedValue(JOB_ID);
    const dto = Object.assign(new CreateJobDto(), {
      sourceVideoPath: '/videos/a.mp4',
      kind: 'scaling',
    });

    await expect(controller.createJob(dto)).resolves.toEqual({ id: JOB_ID });
    expect(jobQueue.addJob).toHaveBeenCalledWith(dto);
  });

  it('returns 404 for an unknown job', () => {
    jobQueue.getJob.mockReturnValue(undefined);

    expect(() => controller.getJob(JOB_ID)).toThrow(NotFoundException);
  });

  it('rejects an unknown status filter or group', () => {
    expect(() => controller.getJobs('sleeping')).toThrow(BadRequestException);
    expect(() => controller.getJobsByGroup('archived')).toThrow(BadRequestException);
  });

  it('passes a known status filter through', () => {
    jobQueue.getAllJobs.mockReturnValue([]);

    controller.getJobs('failed');

    expect(jobQueue.getAllJobs).toHaveBeenCalledWith('failed');
  });

  describe('transitions', () => {
    it('reports success', async () => {
      jobQueue.getJob.mockReturnValue(buildJob({ id: JOB_ID, status: 'running' }));
      jobQueue.pauseJob.mockResolvedValue(true);

      await expect(controller.pauseJob(JOB_ID)).resolves.toEqual({
        message: `Job ${JOB_ID} paused`,
      });
    });

    it('returns 404 when the job is absent', async () => {
      jobQueue.getJob.mockReturnValue(undefined);

      await expect(controller.cancelJob(JOB_ID)).rejects.toBeInstanceOf(NotFoundException);
      expect(jobQueue.cancelJob).not.toHaveBeenCalled();
    });

    it('returns 409 when the transition is not allowed', async () => {
      jobQueue.getJob.mockReturnValue(buildJob({ id: JOB_ID, status: 'completed' }));
      jobQueue.retryJob.mockResolvedValue(false);

      await expect(controller.retryJob(JOB_ID)).rejects.toEqual(
        new ConflictException(`Cannot retry job ${JOB_ID} while it is completed`),
      );
    });
  });

  it('returns 404 when deleting an unknown job', async () => {
    jobQueue.deleteJob.mockResolvedValue(false);

    await expect(controller.deleteJob(JOB_ID)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('reports the queue state after start and stop', () => {
    jobQueue.isQueuePaused.mockReturnValueOnce(false).mockReturnValueOnce(true);

    expect(controller.startQueue()).toEqual({ paused: false });
    expect(controller.stopQueue()).toEqual({ paused: true });
    expect(jobQueue.startQueue).toHaveBeenCalledTimes(1);
    expect(jobQueue.stopQueue).toHaveBeenCalledTimes(1);
  });

  describe('output download', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'download-'));
    });

    afterEach(async () => {
      await fsPromises.rm(dir, { recursive: true, force: true });
    });

    it('streams the output of a completed job', async () => {
      const outputPath = path.join(dir, 'clip_scaling.mp4');
      await fsPromises.writeFile(outputPath, 'encoded');
      jobQueue.getJob.mockReturnValue(buildJob({ id: JOB_ID, status: 'completed', outputPath }));

      const file = await controller.downloadOutput(JOB_ID);

      expect(file).toBeInstanceOf(StreamableFile);
      expect(file.options).toMatchObject({
        type: 'video/mp4',
        length: 7,
        disposition: 'attachment; filename="clip_scaling.mp4"',
      });
      file.getStream().destroy();
    });

    it('refuses unfinished jobs', async () => {
      jobQueue.getJob.mockReturnValue(buildJob({ id: JOB_ID, status: 'running' }));

      await expect(controller.downloadOutput(JOB_ID)).rejects.toBeInstanceOf(ConflictException);
    });
  });
});

describe('CreateJobDto validation', () => {
  const pipe = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true });
  const validate = (body: object) =>
    pipe.transform(body, { type: 'body', metatype: CreateJobDto });

  it('accepts a minimal body', async () => {
    await expect(validate({ sourceVideoPath: '/videos/a.mp4', kind: 'interpolation' })).resolves
      .toBeInstanceOf(CreateJobDto);
  });

  it('rejects a missing source path', async () => {
    await expect(validate({ kind: 'scaling' })).rejects.toBeInstanceOf(BadRequestException);
  });

  it('rejects an unknown kind', async () => {
    await expect(
      validate({ sourceVideoPath: '/videos/a.mp4', kind: 'colorize' }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('rejects unknown fields', async () => {
    await expect(
      validate({ sourceVideoPath: '/videos/a.mp4', kind: 'scaling', priority: 1 }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });
});
