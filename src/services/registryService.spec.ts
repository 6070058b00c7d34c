import { HttpStub, startHttpStub } from '../testUtils/httpStub';
import { DigiLockerRegistryService } from './registryService';

const FIELDS = { name: 'TEST USER', panNumber: 'ABCDE1234F' };

describe('DigiLockerRegistryService', () => {
  let stub: HttpStub;
  let registry: DigiLockerRegistryService;

  beforeEach(async () => {
    stub = await startHttpStub();
    registry = new DigiLockerRegistryService({ registryUrl: `${stub.url}/verify`, apiKey: 'test-secret', timeoutMs: 500 });
  });

  afterEach(async () => {
    await stub.close();
  });

  it('reports every document as matched without a registry url', async () => {
    const offline = new DigiLockerRegistryService({ timeoutMs: 500 });

    expect(await offline.verify(FIELDS, 'pan')).toBe('matched');
  });

  it('posts the extracted fields with the api key', async () => {
    stub.reply({ status: 200, body: { verified: true } });

    expect(await registry.verify(FIELDS, 'pan')).toBe('matched');
    expect(stub.requests).toHaveLength(1);
    expect(stub.requests[0]).toMatchObject({
      method: 'POST',
      url: '/verify',
      body: { doc_type: 'pan', doc_info: FIELDS },
    });
    expect(stub.requests[0].headers.authorization).toBe('Bearer test-secret');
  });

  it('reports a negative verdict as mismatched', async () => {
    stub.reply({ status: 200, body: { verified: false } });

    expect(await registry.verify(FIELDS, 'aadhaar')).toBe('mismatched');
  });

  it.each([
    [404, 'mismatched'],
    [422, 'mismatched'],
    [401, 'unavailable'],
    [429, 'unavailable'],
    [503, 'unavailable'],
  ])('maps HTTP %i to %s', async (status, expected) => {
    stub.reply({ status, body: { error: 'rejected' } });

    expect(await registry.verify(FIELDS, 'pan')).toBe(expected);
  });

  it('treats an unexpected body as unavailable', async () => {
    stub.reply({ status: 200, body: { result: 'ok' } });

    expect(await registry.verify(FIELDS, 'pan')).toBe('unavailable');
  });

  it('gives up on a slow registry', async () => {
    stub.reply({ status: 200, body: { verified: true }, delayMs: 1000 });

    expect(await registry.verify(FIELDS, 'pan')).toBe('unavailable');
  });

  it('stops when the caller aborts', async () => {
    stub.reply({ status: 200, body: { verified: true }, delayMs: 1000 });
    const controller = new AbortController();

    const pending = registry.verify(FIELDS, 'pan', controller.signal);
    controller.abort();

    expect(await pending).toBe('unavailable');
  });
});
