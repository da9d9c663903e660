/**
 * HTML report rendering.
 */
import type { JsonValue } from '../resource/types.js';
import { isJsonObject } from '../resource/model.js';
import { ORPHAN_DETAILS } from '../validation/markers.js';
import { sortedVerdicts } from '../validation/run.js';
import type { ValidationResult, VerdictResult } from '../validation/types.js';
import type { ReportContext } from './types.js';

const STYLE = `      .pass {background-color:#99EE99}
      .fail {background-color:#EE9999}
      .warn {background-color:#EEEE99}
      .bluebg {background-color:#BDD6EE}
      .center {text-align:center;}
      .title {background-color:#DDDDDD; border: 1pt solid; font-height: 30px; padding: 8px}
      .titlerow {border: 2pt solid}
      body {background-color:lightgrey; border: 1pt solid; text-align:center; margin-left:auto; margin-right:auto}
      th {text-align:center; background-color:beige; border: 1pt solid}
      td {text-align:left; background-color:white; border: 1pt solid; word-wrap:break-word;}
      table {width:90%; margin: 0px auto; table-layout:fixed;}
      pre {text-align:left; white-space:pre-wrap; word-wrap:break-word; font-size:smaller}`;

const RESULT_CLASSES: Record<VerdictResult, string> = {
  Pass: 'pass center',
  Fail: 'fail center',
  Warning: 'warn center',
};

/**
 * Escape text for inclusion in HTML content or a quoted attribute.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Copy a JSON value with object keys sorted at every level.
 */
export function sortJsonKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortJsonKeys);
  }
  if (isJsonObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortJsonKeys(value[key])])
    );
  }
  return value;
}

function resultRows(result: ValidationResult): string[] {
  const rows: string[] = [];

  for (const [uri, verdict] of sortedVerdicts(result)) {
    const text = verdict.result === 'Pass' ? verdict.result : `${verdict.result}: ${verdict.details}`;
    rows.push(
      `<tr><td>${escapeHtml(uri)}</td><td class="${RESULT_CLASSES[verdict.result]}" width="30%">${escapeHtml(text)}</td></tr>`
    );
  }

  for (const orphan of result.orphans) {
    const payload = JSON.stringify(sortJsonKeys(orphan), null, 4);
    rows.push(
      `<tr><td><pre>${escapeHtml(payload)}</pre></td><td class="fail center" width="30%">Fail: ${escapeHtml(ORPHAN_DETAILS)}</td></tr>`
    );
  }

  return rows;
}

/**
 * Render a validation result as a standalone HTML page.
 */
export function generateHtmlReport(result: ValidationResult, context: ReportContext): string {
  const title = escapeHtml(context.title);
  const rows = resultRows(result);

  const header = [`        <h2>##### ${title} #####</h2>`];
  if (context.logo) {
    header.push(`        <h4><img align="center" alt="Logo" src="${escapeHtml(context.logo)}"></h4>`);
  }
  header.push(`        Tool Version: ${escapeHtml(context.toolVersion)}<br/>`);
  header.push(`        ${escapeHtml(context.timestamp.toISOString())}<br/>`);

  const system = context.user === undefined
    ? `System: ${escapeHtml(context.system)}`
    : `System: ${escapeHtml(context.system)}, User: ${escapeHtml(context.user)}`;

  const lines = [
    '<html>',
    '  <head>',
    `    <title>${title} Summary</title>`,
    '    <style>',
    STYLE,
    '    </style>',
    '  </head>',
    '  <body>',
    '  <table>',
    '    <tr>',
    '      <th>',
    ...header,
    '      </th>',
    '    </tr>',
    '    <tr>',
    '      <th>',
    `        ${system}<br/>`,
    `        OpenAPI Specification: ${escapeHtml(context.openapi)}<br/>`,
    '      </th>',
    '    </tr>',
    '    <tr>',
    '      <td>',
    '        <center><b>Results Summary</b></center>',
    `        <center>Pass: ${result.totalPass}, Fail: ${result.totalFail}, Warning: ${result.totalWarn}</center>`,
    '      </td>',
    '    </tr>',
    '    <tr>',
    '      <th class="titlerow bluebg">',
    '        <b>Results</b>',
    '      </th>',
    '    </tr>',
  ];

  if (rows.length > 0) {
    lines.push(`    <tr><td><table>${rows.join('')}</table></td></tr>`);
  }

  lines.push('  </table>', '  </body>', '</html>', '');
  return lines.join('\n');
}
