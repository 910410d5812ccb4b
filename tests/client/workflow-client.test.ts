import { WorkflowClient } from '../../src/client';
import { createClientConfig } from '../../src/config';
import { JobStatus } from '../../src/domain/job';
import { SubmissionRejectedError, TimeoutError } from '../../src/domain/errors';
import { LogLevel, resetLogHandler, setLogHandler } from '../../src/logger';
import { FakeComfyServer, json } from '../helpers/fake-server';

const PORTRAIT = {
  '3': {
    inputs: { text: 'a lighthouse at dusk' },
    class_type: 'CLIPTextEncode',
    _meta: { title: 'Positive Prompt' },
  },
  '5': {
    inputs: { seed: 1, steps: 20, positive: ['3', 0] },
    class_type: 'KSampler',
    _meta: { title: 'KSampler' },
  },
  '9': {
    inputs: { filename_prefix: 'ComfyUI', images: ['5', 0] },
    class_type: 'SaveImage',
    _meta: { title: 'Save Image' },
  },
};

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function finishWithImage(server: FakeComfyServer): void {
  server.onSubmit = (jobId) => {
    server.emit('execution_start', jobId);
    server.emit('executing', jobId, { node: '9' });
    server.emit('executed', jobId, {
      node: '9',
      output: { images: [{ filename: 'ComfyUI_00001_.png', subfolder: '', type: 'output' }] },
    });
    server.emit('execution_success', jobId);
  };
}

describe('WorkflowClient', () => {
  let server: FakeComfyServer;
  let client: WorkflowClient;

  beforeEach(() => {
    setLogHandler(() => undefined);
    server = new FakeComfyServer();
    server.files.set('ComfyUI_00001_.png', PNG);
    client = WorkflowClient.fromConfig(
      createClientConfig({ baseUrl: 'http://127.0.0.1:8188', logLevel: LogLevel.Warn }),
      { fetch: server.fetch, socketFactory: server.socketFactory },
    );
  });

  afterEach(async () => {
    await client.close();
    resetLogHandler();
  });

  test('edits a loaded workflow, runs it and downloads the image', async () => {
    const graph = await client.parseWorkflow(JSON.stringify(PORTRAIT));
    graph.node('Positive Prompt').property('text').set('A beautiful woman with blonde hair');
    graph.node(5).property('seed').set(1234);
    finishWithImage(server);

    const result = await client.run(graph);

    expect(result.status).toBe(JobStatus.Succeeded);
    expect(result.artifacts.length).toBe(1);
    const image = result.artifacts.at(0);
    expect(image?.nodeId).toBe(9);
    expect(image?.slot).toBe(0);
    expect(image?.mediaType).toBe('image/png');
    expect(await image?.bytes()).toEqual(PNG);

    const [post] = server.requestsTo('POST', '/prompt');
    expect(post.body).toEqual({
      client_id: expect.any(String),
      prompt: {
        ...PORTRAIT,
        '3': { ...PORTRAIT['3'], inputs: { text: 'A beautiful woman with blonde hair' } },
        '5': { ...PORTRAIT['5'], inputs: { seed: 1234, steps: 20, positive: ['3', 0] } },
      },
    });
  });

  test('edits after submission do not reach the job', async () => {
    const graph = await client.parseWorkflow(JSON.stringify(PORTRAIT));
    finishWithImage(server);
    const session = await client.submit(graph);

    graph.node(3).property('text').set('a forest');

    await session.wait();
    expect(session.snapshot.prompt['3'].inputs?.text).toBe('a lighthouse at dusk');
    const [post] = server.requestsTo('POST', '/prompt');
    expect(post.body).toMatchObject({ prompt: { '3': { inputs: { text: 'a lighthouse at dusk' } } } });
  });

  test('a failed job reports the server reason', async () => {
    server.onSubmit = (jobId) => {
      server.emit('execution_start', jobId);
      server.emit('execution_error', jobId, {
        node_id: '5',
        node_type: 'KSampler',
        exception_message: 'Allocation on device failed',
        exception_type: 'torch.OutOfMemoryError',
      });
    };
    const result = await client.run(await client.parseWorkflow(JSON.stringify(PORTRAIT)));

    expect(result.status).toBe(JobStatus.Failed);
    expect(result.failure).toEqual({
      reason: 'Allocation on device failed',
      nodeId: 5,
      nodeType: 'KSampler',
      exceptionType: 'torch.OutOfMemoryError',
      traceback: undefined,
    });
    expect(result.artifacts.length).toBe(0);
  });

  test('a rejected workflow raises SubmissionRejectedError', async () => {
    server.handle('POST /prompt', () =>
      json({ error: { message: 'Prompt outputs failed validation' }, node_errors: { '9': { errors: [] } } }, 400),
    );
    await expect(client.run(await client.parseWorkflow(JSON.stringify(PORTRAIT)))).rejects.toBeInstanceOf(
      SubmissionRejectedError,
    );
  });

  test('the configured timeout cancels a job that never finishes', async () => {
    const impatient = WorkflowClient.fromConfig(
      createClientConfig({ baseUrl: 'http://127.0.0.1:8188', timeoutMs: 30 }),
      { fetch: server.fetch, socketFactory: server.socketFactory },
    );
    server.onSubmit = (jobId) => server.running.push(jobId);

    const err = await impatient.run(await impatient.parseWorkflow(JSON.stringify(PORTRAIT))).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(server.requestsTo('POST', '/interrupt')[0].body).toEqual({ prompt_id: 'job-1' });
    await impatient.close();
  });

  test('editor-format files are converted by the server', async () => {
    server.handle('POST /workflow/convert', () => json(PORTRAIT));
    const graph = await client.parseWorkflow(JSON.stringify({ nodes: [{ id: 3 }], links: [], version: 0.4 }));
    expect(graph.nodes().map((n) => n.id)).toEqual([3, 5, 9]);
    expect(server.requestsTo('POST', '/workflow/convert')).toHaveLength(1);
  });

  test('an explicit converter takes precedence over the connection', async () => {
    const convertWorkflow = jest.fn(async (): Promise<unknown> => PORTRAIT);
    const local = new WorkflowClient(client.connection, { converter: { convertWorkflow } });
    await local.parseWorkflow(JSON.stringify({ nodes: [], links: [] }));
    expect(convertWorkflow).toHaveBeenCalledTimes(1);
    expect(server.requestsTo('POST', '/workflow/convert')).toHaveLength(0);
  });
});
