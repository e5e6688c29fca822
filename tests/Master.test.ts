import { ConfigurationError, PoolExhaustionError, WorkerFault } from '../src/errors';
import { Master, MasterOptions, RawTaskInput } from '../src/scheduler/Master';
import { RateLimiter } from '../src/scheduler/RateLimiter';
import type { WorkerProvisioner } from '../src/scheduler/types';
import { FakeScraper, FakeSelector, delay, fail, ok, silenceConsole } from './helpers';

class RecordingProvisioner implements WorkerProvisioner {
    setUps: string[] = [];
    tearDowns: string[] = [];

    constructor(private readonly refuse: (name: string) => boolean = () => false) {}

    async setUp(name: string): Promise<void> {
        this.setUps.push(name);
        if (this.refuse(name)) {
            throw new Error(`no browser for ${name}`);
        }
    }

    async tearDown(name: string): Promise<void> {
        this.tearDowns.push(name);
    }
}

const newsTasks = (count: number, priority = 1): RawTaskInput[] =>
    Array.from({ length: count }, (_, i) => ({ priority, url: `https://example.com/${i + 1}`, type: 'news' }));

const slowScraper = (ms: number) => new FakeScraper(async url => {
    await delay(ms);
    return ok([{ url }]);
});

describe('Master', () => {
    silenceConsole();

    const createMaster = (options: Partial<MasterOptions> & Pick<MasterOptions, 'selector'>) => new Master({
        rateLimiter: new RateLimiter(1000),
        retryDelayMs: 0,
        ...options
    });

    describe('submit', () => {
        it('should assign sequential ids in submission order', () => {
            const master = createMaster({ selector: new FakeSelector({}) });

            const first = master.submit(newsTasks(2));
            const second = master.submit([{ priority: 0, url: '', type: 'rss', searchWord: 'inflation' }]);

            expect(first.map(t => t.id)).toEqual([1, 2]);
            expect(second).toEqual([
                expect.objectContaining({ id: 3, priority: 0, url: '', type: 'rss', searchWord: 'inflation' })
            ]);
            expect(Object.isFrozen(second[0])).toBe(true);
        });

        it('should carry only the fields a task input gives', () => {
            const master = createMaster({ selector: new FakeSelector({}) });
            const input = { priority: 2, url: 'https://example.com/a', type: 'blog', note: 'ignored' };

            const [task] = master.submit([input]);

            expect(Object.keys(task).sort()).toEqual(['createdAt', 'id', 'priority', 'type', 'url']);
            expect(task).toMatchObject({ id: 1, priority: 2, url: 'https://example.com/a', type: 'blog' });
        });

        it('should reject an empty task list', () => {
            const master = createMaster({ selector: new FakeSelector({}) });
            expect(() => master.submit([])).toThrow(new ConfigurationError('Task list is empty'));
        });

        it('should reject the whole batch on an unknown type', () => {
            const master = createMaster({ selector: new FakeSelector({}) });
            const batch = [...newsTasks(1), { priority: 1, url: 'https://example.com/v', type: 'video' }];

            expect(() => master.submit(batch)).toThrow("Task #1: unrecognized type 'video'");
            expect(master.submit(newsTasks(1))[0].id).toBe(1);
        });

        it('should reject a fractional priority', () => {
            const master = createMaster({ selector: new FakeSelector({}) });
            expect(() => master.submit([{ priority: 1.5, url: 'https://example.com', type: 'news' }]))
                .toThrow('Task #0: priority must be an integer, got 1.5');
        });

        it('should refuse tasks once the run has started', async () => {
            const master = createMaster({ selector: new FakeSelector({ news: new FakeScraper() }) });
            master.submit(newsTasks(1));
            const run = master.run(1, 1);

            expect(() => master.submit(newsTasks(1))).toThrow('Tasks cannot be submitted once a run has started');
            await run;
        });
    });

    describe('run', () => {
        it('should reject a maxAttempts below one', () => {
            expect(() => createMaster({ selector: new FakeSelector({}), maxAttempts: 0 })).toThrow(ConfigurationError);
        });

        it.each([
            [0, 2],
            [3, 2],
            [1.5, 2]
        ])('should reject worker bounds min=%p max=%p', async (min, max) => {
            const master = createMaster({ selector: new FakeSelector({}) });
            master.submit(newsTasks(1));

            await expect(master.run(min, max)).rejects.toThrow(ConfigurationError);
            expect(master.getState()).toBe('pending');
        });

        it('should refuse to run without tasks', async () => {
            const master = createMaster({ selector: new FakeSelector({}) });
            await expect(master.run(1, 2)).rejects.toThrow('No tasks submitted');
        });

        it('should refuse to run twice', async () => {
            const master = createMaster({ selector: new FakeSelector({ news: new FakeScraper() }) });
            master.submit(newsTasks(1));
            await master.run(1, 1);

            await expect(master.run(1, 1)).rejects.toThrow('This master has already run');
        });

        it('should produce exactly one result per task', async () => {
            const scraper = new FakeScraper(url => ok([{ url }]));
            const master = createMaster({ selector: new FakeSelector({ news: scraper }) });
            master.submit(newsTasks(6));

            const stats = await master.run(1, 3);

            const ids = master.getResults().map(r => r.taskId).sort((a, b) => a - b);
            expect(ids).toEqual([1, 2, 3, 4, 5, 6]);
            expect(stats).toMatchObject({ total: 6, succeeded: 6, failed: 0, successRate: 100, totalRecords: 6 });
            expect(stats.bySourceType).toEqual({ news: { total: 6, succeeded: 6, failed: 0, records: 6 } });
            expect(master.getState()).toBe('finished');
        });

        it('should dispatch higher priorities first', async () => {
            const scraper = new FakeScraper();
            const master = createMaster({ selector: new FakeSelector({ news: scraper }) });
            master.submit([
                { priority: 5, url: 'https://example.com/a', type: 'news' },
                { priority: 1, url: 'https://example.com/b', type: 'news' },
                { priority: 3, url: 'https://example.com/c', type: 'news' }
            ]);

            await master.run(1, 1);

            expect(scraper.calls.map(c => c.url)).toEqual([
                'https://example.com/a',
                'https://example.com/c',
                'https://example.com/b'
            ]);
        });

        it('should recover a task that succeeds on its third attempt', async () => {
            const scraper = new FakeScraper((url, call) => (call < 3 ? fail('HTTP 503') : ok([{ url }])));
            const master = createMaster({ selector: new FakeSelector({ news: scraper }), retryDelayMs: 20 });
            master.submit(newsTasks(1));

            await master.run(1, 1);

            const [result] = master.getResults();
            expect(result).toMatchObject({ success: true, attempts: 3, errors: ['HTTP 503', 'HTTP 503'] });
            expect(result.processingTimeMs).toBeGreaterThanOrEqual(40);
        });

        it('should record a task that keeps failing', async () => {
            const scraper = new FakeScraper(() => fail('HTTP 503'));
            const master = createMaster({ selector: new FakeSelector({ news: scraper }) });
            master.submit(newsTasks(1));

            const stats = await master.run(1, 1);

            expect(master.getResults()[0]).toMatchObject({ success: false, attempts: 3, errorMessage: 'HTTP 503' });
            expect(scraper.calls).toHaveLength(3);
            expect(stats).toMatchObject({ succeeded: 0, failed: 1, successRate: 0 });
        });

        it('should fail tasks whose type has no scraper without stopping the run', async () => {
            const scraper = new FakeScraper();
            const master = createMaster({ selector: new FakeSelector({ news: scraper }) });
            master.submit([
                { priority: 1, url: 'https://example.com/news', type: 'news' },
                { priority: 1, url: 'https://example.com/blog', type: 'blog' }
            ]);

            const stats = await master.run(1, 2);

            const blog = master.getResults().find(r => r.taskId === 2);
            expect(blog).toMatchObject({ success: false, attempts: 0, sourceType: 'blog' });
            expect(stats).toMatchObject({ succeeded: 1, failed: 1 });
            expect(scraper.calls.map(c => c.url)).toEqual(['https://example.com/news']);
        });

        it('should hold every worker to the shared rate limit', async () => {
            const scraper = new FakeScraper();
            const master = createMaster({ selector: new FakeSelector({ news: scraper }), rateLimiter: new RateLimiter(1) });
            master.submit(newsTasks(3));
            const startedAt = Date.now();

            await master.run(3, 3);

            expect(Date.now() - startedAt).toBeGreaterThanOrEqual(2000);
            const times = scraper.calls.map(c => c.at).sort((a, b) => a - b);
            expect(times[1] - times[0]).toBeGreaterThanOrEqual(950);
            expect(times[2] - times[1]).toBeGreaterThanOrEqual(950);
        }, 10000);
    });

    describe('pool sizing', () => {
        it.each([
            [10, 1, 3, 3],
            [2, 1, 5, 2],
            [1, 2, 4, 2]
        ])('should start the clamped pool for %p tasks within [%p, %p]', async (tasks, min, max, expected) => {
            const provisioner = new RecordingProvisioner();
            const master = createMaster({ selector: new FakeSelector({ news: new FakeScraper() }), provisioner });
            master.submit(newsTasks(tasks));

            const stats = await master.run(min, max);

            expect(provisioner.setUps).toHaveLength(expected);
            expect(stats.peakActiveWorkers).toBe(expected);
            expect([...provisioner.tearDowns].sort()).toEqual([...provisioner.setUps].sort());
        });

        it('should run with fewer workers when the minimum is still met', async () => {
            const provisioner = new RecordingProvisioner(name => name === 'w2');
            const master = createMaster({ selector: new FakeSelector({ news: new FakeScraper() }), provisioner });
            master.submit(newsTasks(4));

            const stats = await master.run(1, 3);

            expect(stats).toMatchObject({ total: 4, succeeded: 4, peakActiveWorkers: 2 });
            expect(master.snapshot().workers.map(w => w.name)).toEqual(['w1', 'w3']);
        });

        it('should fail before running anything when the minimum cannot start', async () => {
            const scraper = new FakeScraper();
            const provisioner = new RecordingProvisioner(name => name !== 'w1');
            const master = createMaster({ selector: new FakeSelector({ news: scraper }), provisioner });
            master.submit(newsTasks(3));

            const error = await master.run(2, 3).catch((err: unknown) => err);

            expect(error).toBeInstanceOf(PoolExhaustionError);
            if (!(error instanceof PoolExhaustionError)) return;
            expect(error.message).toBe('Only 1 of 2 required workers could be started');
            expect(error.started).toBe(1);
            expect(error.required).toBe(2);
            expect(provisioner.tearDowns).toEqual(['w1']);
            expect(scraper.calls).toHaveLength(0);
            expect(master.getState()).toBe('finished');
        });
    });

    describe('worker faults', () => {
        it('should requeue the task of a crashed worker onto a replacement', async () => {
            const scraper = new FakeScraper((url, call) => {
                if (call === 1) throw new WorkerFault('browser gone');
                return ok([{ url }]);
            });
            const provisioner = new RecordingProvisioner();
            const master = createMaster({ selector: new FakeSelector({ news: scraper }), provisioner });
            master.submit(newsTasks(1));

            const stats = await master.run(1, 1);

            expect(master.getResults()).toEqual([
                expect.objectContaining({ taskId: 1, success: true, workerName: 'w2', attempts: 1 })
            ]);
            expect(provisioner.setUps).toEqual(['w1', 'w2']);
            expect(provisioner.tearDowns).toEqual(['w1', 'w2']);
            expect(stats.succeeded).toBe(1);
        });

        it('should fail a task that crashes its worker twice', async () => {
            const scraper = new FakeScraper(() => {
                throw new WorkerFault('browser gone');
            });
            const master = createMaster({ selector: new FakeSelector({ news: scraper }) });
            master.submit(newsTasks(1));

            const stats = await master.run(1, 1);

            expect(master.getResults()).toEqual([
                expect.objectContaining({
                    taskId: 1,
                    success: false,
                    workerName: 'w2',
                    attempts: 0,
                    errorMessage: 'WorkerFault: Worker w2 crashed: browser gone'
                })
            ]);
            expect(scraper.calls).toHaveLength(2);
            expect(stats.failed).toBe(1);
            expect(master.snapshot().workers.map(w => [w.name, w.state])).toEqual([['w1', 'dead'], ['w2', 'dead']]);
        });

        it('should fail the task right away when requeues are disabled', async () => {
            const scraper = new FakeScraper(() => {
                throw new WorkerFault('session closed');
            });
            const master = createMaster({ selector: new FakeSelector({ news: scraper }), maxTaskRequeues: 0 });
            master.submit(newsTasks(1));

            await master.run(1, 1);

            expect(master.getResults()[0].errorMessage).toBe('WorkerFault: Worker w1 crashed: session closed');
            expect(scraper.calls).toHaveLength(1);
        });
    });

    describe('cancel', () => {
        it('should be a no-op before the run starts', () => {
            const master = createMaster({ selector: new FakeSelector({}) });
            master.cancel();
            expect(master.getState()).toBe('pending');
        });

        it('should fail queued tasks and let the in-flight one finish', async () => {
            const master = createMaster({ selector: new FakeSelector({ news: slowScraper(50) }) });
            master.submit(newsTasks(4));

            const run = master.run(1, 1);
            await delay(10);
            master.cancel('test');
            expect(master.getState()).toBe('cancelling');

            const stats = await run;

            const results = master.getResults();
            expect(results.map(r => r.taskId)).toEqual([2, 3, 4, 1]);
            expect(results[0]).toMatchObject({ success: false, workerName: 'master', errorMessage: 'Run cancelled: test' });
            expect(results[3]).toMatchObject({ success: true, workerName: 'w1' });
            expect(stats).toMatchObject({ total: 4, succeeded: 1, failed: 3 });
            expect(master.getState()).toBe('finished');
        });
    });

    describe('observation', () => {
        it('should report a snapshot while tasks are in flight', async () => {
            const master = createMaster({ selector: new FakeSelector({ news: slowScraper(50) }) });
            master.submit(newsTasks(3));

            const run = master.run(2, 2);
            await delay(10);

            expect(master.snapshot()).toMatchObject({
                state: 'running',
                total: 3,
                completed: 0,
                queueDepth: 1,
                inFlight: 2,
                activeWorkers: 2,
                resultBacklog: 0,
                rateLimitGrants: 2
            });

            await run;
            expect(master.snapshot()).toMatchObject({
                state: 'finished',
                completed: 3,
                succeeded: 3,
                activeWorkers: 0,
                resultBacklog: 0,
                rateLimitGrants: 3
            });
        });

        it('should hand out frozen results', async () => {
            const master = createMaster({ selector: new FakeSelector({ news: new FakeScraper() }) });
            master.submit(newsTasks(2));
            await master.run(1, 2);

            master.getResults().forEach(result => {
                expect(Object.isFrozen(result)).toBe(true);
            });
        });

        it('should log progress on the monitor interval', async () => {
            const master = createMaster({ selector: new FakeSelector({ news: slowScraper(80) }), monitorIntervalMs: 20 });
            master.submit(newsTasks(1));
            const log = jest.spyOn(console, 'log');

            await master.run(1, 1);

            expect(log).toHaveBeenCalledWith('[Master] 📊 0.0% completed (0/1), queue=0, in flight=1');
            expect(log).toHaveBeenCalledWith('[Master]    Worker w1: busy (task 1)');
        });
    });
});
