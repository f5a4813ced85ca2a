import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  FileWorkerDirectory,
  StaticWorkerDirectory,
  parseDirectory,
} from '../src/infrastructure/workers/FileWorkerDirectory.js';

describe('parseDirectory', () => {
  test('should map peers in file order', () => {
    const workers = parseDirectory(
      {
        peers: {
          'gpu-box': { ip: '10.0.0.10', cpus: 16, memory: 64, gpus: 2 },
          'edge-pi': { ip: '10.0.0.20', agent_port: 7577 },
        },
      },
      7576
    );

    expect(workers).toEqual([
      { name: 'gpu-box', ip: '10.0.0.10', agentPort: 7576, cpus: 16, memoryGb: 64, gpus: 2 },
      { name: 'edge-pi', ip: '10.0.0.20', agentPort: 7577, cpus: undefined, memoryGb: undefined, gpus: 0 },
    ]);
  });

  test('should treat a missing peers key as empty', () => {
    expect(parseDirectory({}, 7576)).toEqual([]);
  });

  test('should reject a peer without an address', () => {
    expect(() => parseDirectory({ peers: { broken: { gpus: 1 } } }, 7576)).toThrow();
  });
});

describe('FileWorkerDirectory', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exec-gateway-'));
    file = path.join(dir, 'workers.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  test('should return no workers when the file is missing', () => {
    expect(new FileWorkerDirectory(file).getWorkers()).toEqual([]);
  });

  test('should pick up edits without a restart', () => {
    const directory = new FileWorkerDirectory(file, 7576);
    fs.writeFileSync(file, JSON.stringify({ peers: { a: { ip: '10.0.0.1' } } }));
    expect(directory.getWorkers().map((w) => w.name)).toEqual(['a']);

    fs.writeFileSync(file, JSON.stringify({ peers: { a: { ip: '10.0.0.1' }, b: { ip: '10.0.0.2' } } }));
    expect(directory.getWorkers().map((w) => w.name)).toEqual(['a', 'b']);
    expect(directory.getWorker('b')?.ip).toBe('10.0.0.2');
    expect(directory.getWorker('c')).toBeNull();
  });

  test('should log and return nothing for an unreadable file', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fs.writeFileSync(file, '{ not json');

    expect(new FileWorkerDirectory(file).getWorkers()).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test('should log a broken file once until it changes', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const directory = new FileWorkerDirectory(file);
    fs.writeFileSync(file, '{ not json');

    directory.getWorkers();
    directory.getWorkers();
    directory.getWorker('a');
    expect(spy).toHaveBeenCalledTimes(1);

    fs.writeFileSync(file, JSON.stringify({ peers: { a: { ip: '10.0.0.1' } } }));
    expect(directory.getWorkers().map((w) => w.name)).toEqual(['a']);
    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy).toHaveBeenLastCalledWith(`[WorkerDirectory] ${file} is readable again`);

    fs.writeFileSync(file, '{ not json');
    directory.getWorkers();
    expect(spy).toHaveBeenCalledTimes(3);
  });
});

describe('StaticWorkerDirectory', () => {
  test('should hand out copies and swap snapshots whole', () => {
    const directory = new StaticWorkerDirectory([{ name: 'a', ip: '10.0.0.1', agentPort: 7576, gpus: 0 }]);

    const snapshot = directory.getWorkers();
    snapshot[0].gpus = 8;
    expect(directory.getWorker('a')?.gpus).toBe(0);

    directory.replace([{ name: 'b', ip: '10.0.0.2', agentPort: 7576, gpus: 1 }]);
    expect(directory.getWorkers().map((w) => w.name)).toEqual(['b']);
    expect(snapshot.map((w) => w.name)).toEqual(['a']);
  });
});
