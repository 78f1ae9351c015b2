import type { Estimate } from '../../types/estimate';
import { config } from '../config';

export interface WorkbookRow {
  Item: string;
  Description: string;
  Unit: string;
  Qty: number;
  'Unit Price': number;
}

export interface WorkbookRequest {
  project_name: string;
  sections: Record<string, WorkbookRow[]>;
}

export interface WorkbookOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export type WorkbookResult =
  | { ok: true; blob: Blob; filename: string }
  | { ok: false; reason: string };

export function toWorkbookRequest(estimate: Estimate): WorkbookRequest {
  const sections: Record<string, WorkbookRow[]> = {};
  for (const section of estimate.sections) {
    sections[section.category] = section.items.map((item) => ({
      Item: item.code,
      Description: item.name,
      Unit: item.unit,
      Qty: item.quantity,
      'Unit Price': item.unitPrice,
    }));
  }
  return {
    project_name: estimate.projectInfo.name.trim() || 'Untitled Project',
    sections,
  };
}

export function workbookFilename(projectName: string): string {
  return `${projectName.trim().replace(/\s+/g, '_') || 'Untitled_Project'}_Estimate.xlsx`;
}

function filenameFromDisposition(header: string | null): string | null {
  if (!header) return null;
  const match = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i.exec(header);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    // plain filename with a literal '%'
    return match[1];
  }
}

/**
 * Ask the export service to render the estimate as a spreadsheet.
 * Never rejects: failures come back as { ok: false } for the UI to show.
 */
export async function requestEstimateWorkbook(
  estimate: Estimate,
  options: WorkbookOptions = {},
): Promise<WorkbookResult> {
  const baseUrl = options.baseUrl ?? config.estimateApiUrl;
  const timeoutMs = options.timeoutMs ?? config.exportTimeoutMs;
  const body = toWorkbookRequest(estimate);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(`${baseUrl}/api/estimate/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!res.ok) {
      console.warn(`[export] Workbook service returned ${res.status}`);
      return { ok: false, reason: `Export service returned HTTP ${res.status}` };
    }

    const blob = await res.blob();
    const filename =
      filenameFromDisposition(res.headers.get('Content-Disposition')) ?? workbookFilename(body.project_name);
    console.log(`[export] Workbook ready: ${filename}`);
    return { ok: true, blob, filename };
  } catch (err) {
    if (controller.signal.aborted) {
      console.warn(`[export] Workbook request timed out after ${timeoutMs}ms`);
      return { ok: false, reason: `Export timed out after ${Math.round(timeoutMs / 1000)}s` };
    }
    const message = err instanceof Error ? err.message : String(err);
    console.warn('[export] Workbook request failed:', message);
    return { ok: false, reason: `Export service unavailable: ${message}` };
  } finally {
    clearTimeout(timeout);
  }
}
