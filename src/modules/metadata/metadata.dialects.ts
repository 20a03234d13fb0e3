// ─── Comandos por dialecto ────────────────────────────────────────────────────
// Cadenas ordenadas de comandos para hostname y modelo. Se ejecutan en orden
// y gana la primera salida que el parser reconoce.

import { Dialect } from '../../types';
import {
  parseConfigHostname,
  parseLabelledHostname,
  parseModelNumberField,
  parseModelNumberIs,
  parseModuleOutput,
} from './metadata.parsers';

export interface CommandStep {
  dialect: Dialect;
  command: string;
  parse:   (output: string) => string;
}

export const HOSTNAME_COMMANDS: readonly CommandStep[] = [
  { dialect: Dialect.NXOS,  command: 'show hostname',                          parse: parseLabelledHostname },
  { dialect: Dialect.IOSXE, command: 'show running-config | include ^hostname', parse: parseConfigHostname   },
];

export const MODEL_COMMANDS: readonly CommandStep[] = [
  { dialect: Dialect.IOSXE, command: 'show version',  parse: parseModelNumberField },
  { dialect: Dialect.NXOS,  command: 'show hardware', parse: parseModelNumberIs    },
  { dialect: Dialect.NXOS,  command: 'show module',   parse: parseModuleOutput     },
];
