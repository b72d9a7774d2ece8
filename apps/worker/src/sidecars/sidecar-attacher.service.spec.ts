import { promises as fs } from 'fs';
import { join } from 'path';
import {
  FakeObjectStore,
  makeTempRoot,
  removeTempRoot,
  testConfig,
} from '../../test/fakes';
import { PipelineConfig } from '../config/pipeline.config';
import { RemoteStoreService } from '../storage/remote-store.service';
import { SidecarAttacherService } from './sidecar-attacher.service';

describe('SidecarAttacherService', () => {
  let root: string;
  let config: Readonly<PipelineConfig>;

  beforeEach(async () => {
    root = await makeTempRoot();
    config = testConfig(root);
    await fs.mkdir(config.transcriptDir, { recursive: true });
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  async function writeTranscript(name: string): Promise<void> {
    await fs.writeFile(join(config.transcriptDir, name), `text of ${name}`);
  }

  test('lists candidates by language, then variant', () => {
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(null, config),
      config,
    );

    expect(attacher.candidatePaths('demo', 3)).toEqual([
      join(config.transcriptDir, 'demo_Ep_3_English_T.txt'),
      join(config.transcriptDir, 'demo_Ep_3_English.txt'),
      join(config.transcriptDir, 'demo_Ep_3_Urdu_T.txt'),
      join(config.transcriptDir, 'demo_Ep_3_Urdu.txt'),
    ]);
  });

  test('returns 0 when no transcripts exist', async () => {
    const store = new FakeObjectStore();
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(store, config),
      config,
    );

    await expect(attacher.findAndAttach('demo', 1)).resolves.toBe(0);
    expect(store.objects.size).toBe(0);
  });

  test('uploads the transcripts that exist', async () => {
    await writeTranscript('demo_Ep_1_Urdu.txt');
    const store = new FakeObjectStore();
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(store, config),
      config,
    );

    await expect(attacher.findAndAttach('demo', 1)).resolves.toBe(1);
    expect([...store.objects.keys()]).toEqual(['transcripts/demo/demo_Ep_1_Urdu.txt']);
  });

  test('finds all four variants', async () => {
    for (const name of [
      'demo_Ep_2_English_T.txt',
      'demo_Ep_2_English.txt',
      'demo_Ep_2_Urdu_T.txt',
      'demo_Ep_2_Urdu.txt',
    ]) {
      await writeTranscript(name);
    }
    const store = new FakeObjectStore();
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(store, config),
      config,
    );

    await expect(attacher.findAndAttach('demo', 2)).resolves.toBe(4);
    expect(store.objects.size).toBe(4);
  });

  test('ignores transcripts of other episodes', async () => {
    await writeTranscript('demo_Ep_12_English.txt');
    await writeTranscript('other_Ep_1_English.txt');
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(new FakeObjectStore(), config),
      config,
    );

    await expect(attacher.findAndAttach('demo', 1)).resolves.toBe(0);
  });

  test('still counts transcripts whose upload fails', async () => {
    await writeTranscript('demo_Ep_1_English.txt');
    const store = new FakeObjectStore();
    store.failPut = true;
    const strict = testConfig(root, { requireRemoteStore: true });
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(store, strict),
      strict,
    );

    await expect(attacher.findAndAttach('demo', 1)).resolves.toBe(1);
  });

  test('only counts transcripts when no object store is configured', async () => {
    await writeTranscript('demo_Ep_1_English_T.txt');
    const attacher = new SidecarAttacherService(
      new RemoteStoreService(null, config),
      config,
    );

    await expect(attacher.findAndAttach('demo', 1)).resolves.toBe(1);
    await expect(fs.readdir(root)).resolves.not.toContain('archive');
  });
});
