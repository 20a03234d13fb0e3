// ─── Parsers de salida de CLI ─────────────────────────────────────────────────
// Cada parser recibe la salida cruda de un comando y devuelve el valor
// encontrado o '' si la salida no tiene el formato esperado.

const TOKEN = '[A-Za-z0-9._\\-]+';
const MODEL_TOKEN = '[A-Za-z0-9._/\\-]+';

function nonEmptyLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
}

// ─── Hostname ────────────────────────────────────────────────────────────────

/**
 * `show hostname` (dialecto A): acepta "Hostname: SW1" o, si la salida es
 * una sola línea con un único token, ese token.
 */
export function parseLabelledHostname(output: string): string {
  const lines = nonEmptyLines(output);
  const labelled = new RegExp(`Hostname\\s*:\\s*(${TOKEN})`, 'i');

  for (const line of lines) {
    const m = line.match(labelled);
    if (m) return m[1];
  }

  if (lines.length === 1 && new RegExp(`^${TOKEN}$`).test(lines[0])) {
    return lines[0];
  }
  return '';
}

/** `show running-config | include ^hostname` (dialecto B) */
export function parseConfigHostname(output: string): string {
  const re = new RegExp(`^\\s*hostname\\s+(${TOKEN})\\s*$`);
  for (const line of output.split(/\r?\n/)) {
    const m = line.match(re);
    if (m) return m[1];
  }
  return '';
}

// ─── Modelo ──────────────────────────────────────────────────────────────────

/** `show version`: "Model Number : C9300-48P" */
export function parseModelNumberField(output: string): string {
  const m = output.match(new RegExp(`Model\\s+Number\\s*:\\s*(${MODEL_TOKEN})`, 'i'));
  return m ? m[1] : '';
}

/** `show hardware`: "Model number is N9K-C93180YC-EX" */
export function parseModelNumberIs(output: string): string {
  const m = output.match(new RegExp(`Model\\s+number\\s+is\\s+(${MODEL_TOKEN})`, 'i'));
  return m ? m[1] : '';
}

// Códigos de familia de producto reconocibles en cualquier parte del texto
const PRODUCT_FAMILY = /\b(N\d{1,2}K-[A-Z0-9-]*[A-Z0-9]|C9\d{3}[A-Z0-9-]*[A-Z0-9]|WS-C[A-Z0-9-]*[A-Z0-9]|ISR\d{4}[A-Z0-9/-]*[A-Z0-9]|ASR\d{3,4}[A-Z0-9-]*[A-Z0-9])\b/;

// Un modelo tiene al menos un guión y algún dígito (ej: N9K-C93180YC-EX)
const MODEL_SHAPE = /^(?=.*\d)[A-Za-z0-9]+(?:-[A-Za-z0-9.]+)+$/;

const SKIPPED_MODULE = /supervisor|fabric/i;

/**
 * `show module`: toma la columna "Model" de la primera fila de módulo que no
 * sea supervisora ni de fabric. La posición de la columna sale del encabezado;
 * si el texto de la columna anterior la invade, se usa el primer token que
 * arranca a partir de esa posición.
 */
export function parseModuleTable(output: string): string {
  const lines  = output.split(/\r?\n/);
  const header = lines.find((l) => /\bModel\b/.test(l) && !/^\s*\d/.test(l));
  if (!header) return '';

  const column = header.search(/\bModel\b/);

  for (const row of lines) {
    if (!/^\s*\d+\s/.test(row) || SKIPPED_MODULE.test(row)) continue;

    for (const token of row.matchAll(/\S+/g)) {
      const start = token.index ?? 0;
      if (start >= column && MODEL_SHAPE.test(token[0])) return token[0];
    }
  }
  return '';
}

export function parseProductFamilyCode(output: string): string {
  const m = output.match(PRODUCT_FAMILY);
  return m ? m[1] : '';
}

/** Tabla de módulos y, si no alcanza, un código de familia suelto en el texto */
export function parseModuleOutput(output: string): string {
  return parseModuleTable(output) || parseProductFamilyCode(output);
}
