/**
 * File management utilities
 */
import { mkdir, writeFile, readFile, access } from 'fs/promises';
import { dirname, basename, extname } from 'path';
import { constants } from 'fs';
import { logger } from './logger.js';

/** JSON.stringify replacer: Maps become plain objects, Dates stay ISO strings */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

export class FileManager {
  /**
   * Ensure a directory exists, creating it if necessary
   */
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await access(dirPath, constants.F_OK);
    } catch {
      await mkdir(dirPath, { recursive: true });
      logger.debug(`Created directory: ${dirPath}`);
    }
  }

  /**
   * Write JSON data to a file
   */
  static async writeJSON(filePath: string, data: unknown): Promise<void> {
    try {
      await this.ensureDir(dirname(filePath));

      const jsonString = JSON.stringify(data, jsonReplacer, 2);
      await writeFile(filePath, jsonString, 'utf-8');
      logger.debug(`Wrote JSON to: ${filePath}`);
    } catch (error) {
      logger.error(`Failed to write JSON to ${filePath}:`, error);
      throw error;
    }
  }

  /**
   * Write binary data (e.g. a workbook) to a file
   */
  static async writeBuffer(filePath: string, data: Buffer): Promise<void> {
    try {
      await this.ensureDir(dirname(filePath));
      await writeFile(filePath, data);
      logger.debug(`Wrote ${data.length} bytes to: ${filePath}`);
    } catch (error) {
      logger.error(`Failed to write ${filePath}:`, error);
      throw error;
    }
  }

  static async readBuffer(filePath: string): Promise<Buffer> {
    try {
      return await readFile(filePath);
    } catch (error) {
      logger.error(`Failed to read ${filePath}:`, error);
      throw error;
    }
  }

  /**
   * Check if a file exists
   */
  static async fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Generate a safe filename from a string
   */
  static sanitizeFilename(filename: string): string {
    return filename
      .replace(/[^a-z0-9_-]/gi, '_')
      .replace(/_+/g, '_')
      .toLowerCase();
  }

  /**
   * JSON output filename derived from the report filename,
   * e.g. "Abandon Analysis.xlsx" -> "abandon_analysis.json"
   */
  static generateJsonFilename(reportFilename: string): string {
    const stem = basename(reportFilename, extname(reportFilename));
    return `${this.sanitizeFilename(stem)}.json`;
  }
}
