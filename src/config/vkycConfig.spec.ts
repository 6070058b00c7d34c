import * as path from 'path';
import { RECORDING_CAP_LIMIT_MS, loadConfig } from './vkycConfig';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({ VKYC_DATA_DIR: '/var/vkyc' });

    expect(config).toMatchObject({
      port: 3001,
      frontendUrl: 'http://localhost:3000',
      linkBaseUrl: 'http://localhost:3000',
      linkTtlMs: 24 * 60 * 60 * 1000,
      requiredDocuments: ['pan', 'aadhaar'],
      requiredLivenessPrompts: ['blink'],
      ocrConfidenceThreshold: 0.6,
      ocrMaxAttempts: 3,
      registryMaxAttempts: 3,
      disconnectGraceMs: 30000,
      recordingCapMs: RECORDING_CAP_LIMIT_MS,
      dataDir: '/var/vkyc',
      recordingsDir: path.join('/var/vkyc', 'recordings'),
      videosDir: path.join('/var/vkyc', 'videos'),
      ffmpegPath: 'ffmpeg',
    });
    expect(config.registryUrl).toBeUndefined();
  });

  it('reads numbers and lists from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      OCR_CONFIDENCE_THRESHOLD: '0.75',
      REQUIRED_DOCUMENTS: ' PAN ,pan',
      REQUIRED_LIVENESS_PROMPTS: 'blink,turn_left',
      DIGILOCKER_API: '  https://registry.example.test  ',
    });

    expect(config.port).toBe(8080);
    expect(config.ocrConfidenceThreshold).toBe(0.75);
    expect(config.requiredDocuments).toEqual(['pan']);
    expect(config.requiredLivenessPrompts).toEqual(['blink', 'turn_left']);
    expect(config.registryUrl).toBe('https://registry.example.test');
  });

  it('never lets the recording cap exceed ten minutes', () => {
    expect(loadConfig({ RECORDING_CAP_MS: '900000' }).recordingCapMs).toBe(600000);
    expect(loadConfig({ RECORDING_CAP_MS: '120000' }).recordingCapMs).toBe(120000);
  });

  it('strips trailing slashes from the link base URL', () => {
    expect(loadConfig({ VKYC_LINK_BASE_URL: 'https://kyc.example.test//' }).linkBaseUrl).toBe('https://kyc.example.test');
    expect(loadConfig({ FRONTEND_URL: 'https://app.example.test/' }).linkBaseUrl).toBe('https://app.example.test');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid value for PORT: "eighty" is not a number');
    expect(() => loadConfig({ OCR_CONFIDENCE_THRESHOLD: '1.5' })).toThrow(
      'Invalid value for OCR_CONFIDENCE_THRESHOLD: 1.5 is above 1',
    );
    expect(() => loadConfig({ RECORDING_CAP_MS: '10' })).toThrow('Invalid value for RECORDING_CAP_MS: 10 is below 1000');
    expect(() => loadConfig({ REQUIRED_DOCUMENTS: 'pan,passport' })).toThrow(
      'Invalid value for REQUIRED_DOCUMENTS: "passport" (allowed: pan, aadhaar)',
    );
  });
});
