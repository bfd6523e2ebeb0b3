import { Test, TestingModule } from '@nestjs/testing';
import { GrpcInvalidArgumentException, GrpcUnavailableException } from '@biocurate/proto';
import { TaskDispatchService } from './task-dispatch.service';
import { ReportCompilationService } from './report-compilation.service';
import { HeatDiffusionTaskService } from './heat-diffusion-task.service';

describe('TaskDispatchService', () => {
  let service: TaskDispatchService;

  const reportId = '1b4e28ba-2fa1-4d3b-a3f5-ef19b5a7633b';

  let reportCompilation: { taskName: string; run: jest.Mock };
  let heatDiffusion: { taskName: string; run: jest.Mock };

  beforeEach(async () => {
    reportCompilation = {
      taskName: 'compile-report',
      run: jest.fn().mockResolvedValue(undefined),
    };
    heatDiffusion = {
      taskName: 'run-heat-diffusion',
      run: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TaskDispatchService,
        { provide: ReportCompilationService, useValue: reportCompilation },
        { provide: HeatDiffusionTaskService, useValue: heatDiffusion },
      ],
    }).compile();

    service = module.get<TaskDispatchService>(TaskDispatchService);
  });

  describe('dispatch', () => {
    it('should accept a known task and run its handler', () => {
      const response = service.dispatch({ taskName: 'compile-report', targetId: reportId });

      expect(response.accepted).toBe(true);
      expect(response.taskId).toMatch(/^[0-9a-f-]{36}$/);
      expect(new Date(response.acceptedAt).toISOString()).toBe(response.acceptedAt);
      expect(reportCompilation.run).toHaveBeenCalledWith(reportId, response.taskId);
      expect(heatDiffusion.run).not.toHaveBeenCalled();
    });

    it('should route experiments to the heat diffusion handler', () => {
      service.dispatch({ taskName: 'run-heat-diffusion', targetId: reportId });

      expect(heatDiffusion.run).toHaveBeenCalledTimes(1);
      expect(reportCompilation.run).not.toHaveBeenCalled();
    });

    it('should reject unknown task names', () => {
      expect(() => service.dispatch({ taskName: 'rebuild-index', targetId: reportId })).toThrow(
        GrpcInvalidArgumentException,
      );
    });

    it('should reject target ids that are not UUIDs', () => {
      expect(() => service.dispatch({ taskName: 'compile-report', targetId: '42' })).toThrow(
        GrpcInvalidArgumentException,
      );
      expect(reportCompilation.run).not.toHaveBeenCalled();
    });

    it('should not let a failing task escape', async () => {
      reportCompilation.run.mockRejectedValueOnce(new Error('connection terminated'));

      service.dispatch({ taskName: 'compile-report', targetId: reportId });
      await service.onApplicationShutdown();

      expect(service.pendingTasks).toBe(0);
    });
  });

  describe('onApplicationShutdown', () => {
    it('should wait for running tasks and refuse new ones', async () => {
      let finish: () => void = () => undefined;
      reportCompilation.run.mockReturnValueOnce(
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
      );

      service.dispatch({ taskName: 'compile-report', targetId: reportId });
      expect(service.pendingTasks).toBe(1);

      const shutdown = service.onApplicationShutdown();
      expect(() => service.dispatch({ taskName: 'compile-report', targetId: reportId })).toThrow(
        GrpcUnavailableException,
      );

      finish();
      await shutdown;
      expect(service.pendingTasks).toBe(0);
    });
  });
});
