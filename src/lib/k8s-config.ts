/**
 * K8s Configuration Module
 * kubectl invocation with connection settings taken from the environment.
 * Inside a pod with none of them set, kubectl falls back to the mounted
 * service account.
 */

import { exec } from 'child_process';
import { promisify } from 'util';

const execAsync = promisify(exec);

const DEFAULT_TIMEOUT_MS = 10000;

// ============================================================
// Input Validation
// ============================================================

/**
 * Kubernetes object and namespace names: DNS-1123 subdomain characters only.
 */
export function isValidResourceName(value: string): boolean {
  return /^[a-z0-9]([a-z0-9.-]*[a-z0-9])?$/.test(value) && value.length <= 253;
}

/**
 * Wrap in single quotes, escaping embedded single quotes.
 */
export function escapeShellArg(arg: string): string {
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

// ============================================================
// Connection Flags
// ============================================================

function connectionArgs(): string[] {
  const args: string[] = [];

  if (process.env.KUBECONFIG) {
    args.push('--kubeconfig', escapeShellArg(process.env.KUBECONFIG));
  }
  if (process.env.K8S_API_URL) {
    args.push('--server', escapeShellArg(process.env.K8S_API_URL));
  }
  if (process.env.K8S_TOKEN) {
    args.push('--token', escapeShellArg(process.env.K8S_TOKEN));
    if (process.env.K8S_INSECURE_TLS === 'true') {
      args.push('--insecure-skip-tls-verify');
    }
  }

  return args;
}

export function getKubectlTimeoutMs(): number {
  const parsed = parseInt(process.env.D8R_KUBECTL_TIMEOUT_MS || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

// ============================================================
// kubectl Command Execution
// ============================================================

/**
 * Execute a kubectl command. `command` is appended verbatim after the
 * connection flags; callers escape their own arguments.
 */
export async function runK8sCommand(
  command: string,
  options?: { timeout?: number }
): Promise<{ stdout: string; stderr: string }> {
  const startTime = Date.now();
  const args = connectionArgs();
  const argsStr = args.length > 0 ? ` ${args.join(' ')}` : '';
  const fullCmd = `kubectl${argsStr} ${command}`;

  try {
    const result = await execAsync(fullCmd, {
      timeout: options?.timeout ?? getKubectlTimeoutMs(),
      maxBuffer: 64 * 1024 * 1024,
    });
    if (process.env.DEBUG_K8S === 'true') {
      console.debug(`[K8s Config] kubectl (${Date.now() - startTime}ms): ${command.substring(0, 60)}`);
    }
    return result;
  } catch (e) {
    const message = e instanceof Error ? e.message : 'Unknown error';
    console.warn(`[K8s Config] kubectl failed (${Date.now() - startTime}ms): ${command.substring(0, 60)}: ${message}`);
    throw e;
  }
}
