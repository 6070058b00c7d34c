/**
 * DigiLocker Registry Service
 * Verifies extracted document fields against the document registry.
 */

import axios from 'axios';
import { DocumentType, RegistryCapability, RegistryStatus } from '../types/vkyc.types';

export interface RegistryServiceConfig {
  registryUrl?: string;
  apiKey?: string;
  timeoutMs: number;
  useMockData?: boolean;
}

// Statuses that say nothing about the document itself
const TRANSIENT_STATUSES = new Set([401, 403, 408, 429]);

export class DigiLockerRegistryService implements RegistryCapability {
  private useMockData: boolean;

  constructor(private readonly config: RegistryServiceConfig) {
    this.useMockData = config.useMockData ?? !config.registryUrl;

    if (this.useMockData) {
      console.warn('[RegistryService] DIGILOCKER_API not configured. Every document will be reported as matched.');
    }
  }

  async verify(fields: Record<string, string>, documentType: DocumentType, signal?: AbortSignal): Promise<RegistryStatus> {
    if (this.useMockData || !this.config.registryUrl) {
      return 'matched';
    }

    try {
      const response = await axios.post<unknown>(
        this.config.registryUrl,
        { doc_type: documentType, doc_info: fields },
        {
          headers: {
            Authorization: `Bearer ${this.config.apiKey ?? ''}`,
            'Content-Type': 'application/json',
          },
          timeout: this.config.timeoutMs,
          signal,
        },
      );

      const body = response.data;
      if (typeof body !== 'object' || body === null || !('verified' in body) || typeof body.verified !== 'boolean') {
        console.warn(`[RegistryService] Unexpected ${documentType} response shape`);
        return 'unavailable';
      }

      console.log(`[RegistryService] ${documentType} verification: ${body.verified ? 'matched' : 'mismatched'}`);
      return body.verified ? 'matched' : 'mismatched';
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        // A definitive client-side rejection of the document
        if (status !== undefined && status >= 400 && status < 500 && !TRANSIENT_STATUSES.has(status)) {
          console.log(`[RegistryService] ${documentType} rejected by registry (${status})`);
          return 'mismatched';
        }
        console.warn(`[RegistryService] Registry unavailable${status ? ` (${status})` : ''}: ${error.message}`);
        return 'unavailable';
      }
      console.error('[RegistryService] Unexpected error:', error);
      return 'unavailable';
    }
  }
}
