/**
 * Service configuration
 *
 * Environment Variables:
 * - PORT: HTTP port (default: 8080)
 * - CONVERT_TMP_DIR: Directory for temporary files (default: OS temp dir)
 * - WKHTMLTOPDF_PATH: Renderer binary (default: wkhtmltopdf on PATH)
 * - LOG_LEVEL: debug | info | warn | error | silent (default: info)
 *
 * Size and time limits are fixed defaults; URL requests may lower or raise
 * their own download cap and timeout per call.
 */
import * as os from 'os';

const MIB = 1024 * 1024;

export interface ServiceConfig {
  serviceName: string;
  port: number;
  tmpDir: string;
  tmpPrefix: string;
  wkhtmltopdfPath: string;
  renderTimeoutMs: number;
  maxHtmlBytes: number;
  maxUploadBytes: number;
  maxDocumentBytes: number;
  maxPages: number;
  defaultUrlMaxMb: number;
  defaultUrlTimeoutSeconds: number;
  connectTimeoutSeconds: number;
  jsonBodyLimit: string;
}

export const DEFAULT_CONFIG: Readonly<ServiceConfig> = Object.freeze({
  serviceName: 'document-conversion',
  port: 8080,
  tmpDir: os.tmpdir(),
  tmpPrefix: 'convert_',
  wkhtmltopdfPath: 'wkhtmltopdf',
  renderTimeoutMs: 60000,
  maxHtmlBytes: 10 * MIB,
  maxUploadBytes: 50 * MIB,
  maxDocumentBytes: 50 * MIB,
  maxPages: 10000,
  defaultUrlMaxMb: 25,
  defaultUrlTimeoutSeconds: 40,
  connectTimeoutSeconds: 10,
  jsonBodyLimit: '10mb'
});

function parsePort(value: string | undefined, fallback: number): number {
  const port = parseInt(value || '', 10);
  return isNaN(port) || port < 0 ? fallback : port;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ServiceConfig> = {}
): Readonly<ServiceConfig> {
  return Object.freeze({
    ...DEFAULT_CONFIG,
    port: parsePort(env.PORT, DEFAULT_CONFIG.port),
    tmpDir: env.CONVERT_TMP_DIR || DEFAULT_CONFIG.tmpDir,
    wkhtmltopdfPath: env.WKHTMLTOPDF_PATH || DEFAULT_CONFIG.wkhtmltopdfPath,
    ...overrides
  });
}
