import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JobQueueService } from '../jobs/job-queue.service';
import { buildJob } from '../testing/job.factory';
import { CleanupService } from './cleanup.service';

describe('CleanupService', () => {
  const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);
  let dataDir: string;
  let service: CleanupService;
  const jobQueue = {
    removeFinishedBefore: jest.fn(),
    getJob: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    jest.spyOn(Date, 'now').mockReturnValue(NOW);
    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'cleanup-'));

    const moduleRef = await Test.createTestingModule({
      providers: [
        CleanupService,
        { provide: JobQueueService, useValue: jobQueue },
        {
          provide: ConfigService,
          useValue: new ConfigService({ JOB_RETENTION_HOURS: 2, DATA_DIR: dataDir }),
        },
      ],
    }).compile();
    service = moduleRef.get(CleanupService);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fsPromises.rm(dataDir, { recursive: true, force: true });
  });

  it('removes finished jobs older than the retention window', async () => {
    jobQueue.removeFinishedBefore.mockResolvedValue(3);

    await service.handleCleanup();

    expect(jobQueue.removeFinishedBefore).toHaveBeenCalledWith(
      new Date(NOW - 2 * 60 * 60 * 1000),
    );
  });

  it('removes work directories of jobs that are no longer running', async () => {
    jobQueue.removeFinishedBefore.mockResolvedValue(0);
    const running = buildJob({ status: 'running' });
    jobQueue.getJob.mockImplementation((id: string) => (id === running.id ? running : undefined));
    const workRoot = path.join(dataDir, 'work');
    await fsPromises.mkdir(path.join(workRoot, running.id), { recursive: true });
    await fsPromises.mkdir(path.join(workRoot, 'crashed-job'), { recursive: true });

    await service.handleCleanup();

    expect((await fsPromises.readdir(workRoot)).sort()).toEqual([running.id]);
  });

  it('logs instead of throwing when the queue fails', async () => {
    jobQueue.removeFinishedBefore.mockRejectedValue(new Error('disk full'));

    await expect(service.handleCleanup()).resolves.toBeUndefined();
  });
});
