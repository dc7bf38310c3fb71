import { basename } from 'path';
import { ParseError } from './errors.js';

const NUMBER = String.raw`-?\d+(?:\.\d+)?`;

/**
 * {datatype}_{wafer}[_{doe}]_die{die}_{cage}_{device}_{temp}C_ch_{in}_{out}_{power}dBm
 *   _pn_{voltage}mV_heat_{heater}_mV.csv
 */
const MEASUREMENT_FILENAME_RE = new RegExp(
  [
    String.raw`^(?<dataType>[^_]+)`,
    String.raw`_(?<wafer>[^_]+)`,
    String.raw`(?:_(?<doe>[^_]+))?`,
    String.raw`_die(?<die>\d+)`,
    String.raw`_(?<cage>[^_]+)`,
    String.raw`_(?<device>[^_]+)`,
    `_(?<conditions>(?<temperature>${NUMBER})C`,
    String.raw`_ch_(?<channelIn>\d+)_(?<channelOut>\d+)`,
    `_(?<power>${NUMBER})dBm`,
    `_pn_(?<driveVoltage>${NUMBER})mV`,
    `_heat_(?<heaterVoltage>${NUMBER})_mV)`,
    String.raw`\.csv$`,
  ].join(''),
  'i'
);

/** Units of the numeric filename fields */
export const FILENAME_UNITS = {
  temperature: '°C',
  power: 'dBm',
  driveVoltage: 'mV',
  heaterVoltage: 'mV',
} as const;

export interface MeasurementFileInfo {
  fileName: string;
  dataType: string;
  wafer: string;
  /** null when the filename carries no DOE token */
  doe: string | null;
  die: number;
  cage: string;
  device: string;
  /** Filename segment from the temperature through the heater voltage, as written */
  conditions: string;
  temperature: number;
  channelIn: number;
  channelOut: number;
  power: number;
  driveVoltage: number;
  heaterVoltage: number;
}

/**
 * Extract the attribute set encoded in a measurement filename
 */
export function parseMeasurementFilename(filePath: string): MeasurementFileInfo {
  const fileName = basename(filePath);
  const groups = MEASUREMENT_FILENAME_RE.exec(fileName)?.groups;

  if (!groups) {
    throw new ParseError(`Filename does not match the measurement convention: ${fileName}`, fileName);
  }

  const text = (name: string): string => {
    const value = groups[name];
    if (value === undefined) {
      throw new ParseError(`Missing ${name} in ${fileName}`, fileName);
    }
    return value;
  };
  const number = (name: string): number => Number(text(name));

  return {
    fileName,
    dataType: text('dataType'),
    wafer: text('wafer'),
    doe: groups.doe ?? null,
    die: number('die'),
    cage: text('cage'),
    device: text('device'),
    conditions: text('conditions'),
    temperature: number('temperature'),
    channelIn: number('channelIn'),
    channelOut: number('channelOut'),
    power: number('power'),
    driveVoltage: number('driveVoltage'),
    heaterVoltage: number('heaterVoltage'),
  };
}
