/**
 * OCR Service
 * Extracts document fields through the per-document OCR endpoints.
 * Falls back to mock data when no endpoint is configured.
 */

import axios from 'axios';
import sharp from 'sharp';
import { DocumentType, OcrCapability, OcrExtraction } from '../types/vkyc.types';

export interface OcrServiceConfig {
  panOcrUrl?: string;
  aadhaarOcrUrl?: string;
  timeoutMs: number;
  useMockData?: boolean;
}

// Longest edge sent to the OCR endpoint
const MAX_EDGE_PX = 1600;

const MOCK_FIELDS: Record<DocumentType, Record<string, string>> = {
  pan: {
    name: 'TEST USER',
    panNumber: 'ABCDE1234F',
    dateOfBirth: '1990-01-01',
  },
  aadhaar: {
    name: 'TEST USER',
    aadhaarNumber: 'XXXX XXXX 1234',
    dateOfBirth: '1990-01-01',
    gender: 'M',
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the string-valued fields of an OCR response; numbers are stringified
 */
function toFields(value: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!isRecord(value)) return fields;

  for (const [key, field] of Object.entries(value)) {
    if (typeof field === 'string' && field.trim()) {
      fields[key] = field.trim();
    } else if (typeof field === 'number' && Number.isFinite(field)) {
      fields[key] = String(field);
    }
  }
  return fields;
}

export class HttpOcrService implements OcrCapability {
  private useMockData: boolean;

  constructor(private readonly config: OcrServiceConfig) {
    this.useMockData = config.useMockData ?? (!config.panOcrUrl || !config.aadhaarOcrUrl);

    if (this.useMockData) {
      console.warn('[OcrService] OCR endpoints not configured. Using mock OCR data.');
    }
  }

  private endpointFor(documentType: DocumentType): string | undefined {
    return documentType === 'pan' ? this.config.panOcrUrl : this.config.aadhaarOcrUrl;
  }

  /**
   * Upright, bounded JPEG regardless of what the camera produced
   */
  async normalizeImage(image: Buffer): Promise<Buffer> {
    return sharp(image)
      .rotate()
      .resize({ width: MAX_EDGE_PX, height: MAX_EDGE_PX, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: 90 })
      .toBuffer();
  }

  async extract(image: Buffer, documentType: DocumentType): Promise<OcrExtraction> {
    if (this.useMockData) {
      console.log(`[OcrService] Using mock OCR data for ${documentType}`);
      return { fields: { ...MOCK_FIELDS[documentType] }, confidence: 0.95 };
    }

    const endpoint = this.endpointFor(documentType);
    if (!endpoint) {
      throw new Error(`No OCR endpoint configured for ${documentType}`);
    }

    let normalized: Buffer;
    try {
      normalized = await this.normalizeImage(image);
    } catch (error) {
      throw new Error(`Unreadable ${documentType} image: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
      const response = await axios.post<unknown>(
        endpoint,
        { image: normalized.toString('base64') },
        { timeout: this.config.timeoutMs },
      );
      return this.parseResponse(response.data, documentType);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new Error(`OCR API error${status ? ` (${status})` : ''}: ${error.message}`);
      }
      throw error;
    }
  }

  private parseResponse(body: unknown, documentType: DocumentType): OcrExtraction {
    if (!isRecord(body)) {
      throw new Error('OCR API returned an unexpected response');
    }
    if (body.success === false) {
      throw new Error(`OCR API error: ${typeof body.error === 'string' ? body.error : 'extraction failed'}`);
    }

    const fields = toFields(body.data ?? body.fields);
    // Endpoints that report no confidence are trusted only when they returned fields
    const confidence = typeof body.confidence === 'number'
      ? Math.min(Math.max(body.confidence, 0), 1)
      : Object.keys(fields).length > 0 ? 1 : 0;

    console.log(`[OcrService] ${documentType} OCR returned ${Object.keys(fields).length} fields, confidence ${confidence}`);
    return { fields, confidence };
  }
}
