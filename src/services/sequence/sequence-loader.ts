/**
 * Sequence Loader
 *
 * Reads and writes sequence files. The encoding follows the file extension
 * (.json, .yaml, .yml); anything else is auto-detected on load and written
 * as YAML.
 */

import * as fs from 'fs/promises';
import path from 'path';
import { config } from '../../config.js';
import type { SequenceFormat } from '../../types/index.js';
import { SequenceFormatError, errorMessage } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import {
  CommentBlock,
  DelayBlock,
  LogDataBlock,
  MeasureBlock,
  OutputEnableBlock,
  SetCurrentBlock,
  SetVoltageBlock,
} from '../blocks/index.js';
import { Sequence } from './sequence.js';

const logger = log.child({ service: 'sequence-loader' });

export function formatFromPath(filePath: string): SequenceFormat | null {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  return null;
}

export class SequenceLoader {
  /**
   * Relative paths resolve against `baseDir` (storage.sequencesDir by default)
   */
  constructor(private readonly baseDir: string = config.storage.sequencesDir) {}

  resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  async load(filePath: string): Promise<Sequence> {
    const fullPath = this.resolve(filePath);

    let content: string;
    try {
      content = await fs.readFile(fullPath, 'utf-8');
    } catch (error) {
      logger.error('Failed to read sequence file', error instanceof Error ? error : undefined, {
        path: fullPath,
      });
      throw new SequenceFormatError(`Sequence file not readable: ${errorMessage(error)}`, {
        operation: 'load',
        path: fullPath,
      });
    }

    const format = formatFromPath(fullPath);
    const sequence =
      format === 'json'
        ? Sequence.fromJSON(content)
        : format === 'yaml'
          ? Sequence.fromYAML(content)
          : Sequence.parse(content);

    logger.info('Loaded sequence', { sequence: sequence.name, path: fullPath, blocks: sequence.length });
    return sequence;
  }

  /**
   * Write `sequence`, creating parent directories. `format` defaults to the
   * one implied by the extension, else YAML.
   * @returns the absolute path written
   */
  async save(sequence: Sequence, filePath: string, format?: SequenceFormat): Promise<string> {
    const fullPath = this.resolve(filePath);
    const encoding = format ?? formatFromPath(fullPath) ?? 'yaml';

    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, sequence.serialize(encoding), 'utf-8');

    logger.info('Saved sequence', { sequence: sequence.name, path: fullPath, format: encoding });
    return fullPath;
  }

  /**
   * Power supply demo: configure 5V/1A, enable, settle, measure, log, disable
   */
  static createExampleSequence(): Sequence {
    const sequence = new Sequence({
      name: 'Example Power Supply Test',
      description: 'Demonstrates basic power supply control and measurement',
    });

    sequence
      .addBlock(
        new CommentBlock('comment1').setParameters({
          text: 'Configure power supply for 5V, 1A output',
        })
      )
      .addBlock(
        new SetVoltageBlock('set_voltage1').setParameters({ instrument: 'PSU1', channel: 1, voltage: 5.0 })
      )
      .addBlock(
        new SetCurrentBlock('set_current1').setParameters({ instrument: 'PSU1', channel: 1, current: 1.0 })
      )
      .addBlock(
        new OutputEnableBlock('enable1').setParameters({ instrument: 'PSU1', channel: 1, enable: true })
      )
      .addBlock(new DelayBlock('delay1').setParameters({ duration: 2.0 }))
      .addBlock(new MeasureBlock('measure1').setParameters({ instrument: 'DMM1', variable: 'voltage' }))
      .addBlock(new LogDataBlock('log1').setParameters({ variable: 'voltage', label: 'Output Voltage' }))
      .addBlock(
        new OutputEnableBlock('disable1').setParameters({ instrument: 'PSU1', channel: 1, enable: false })
      );

    return sequence;
  }
}
