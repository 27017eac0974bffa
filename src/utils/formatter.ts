/**
 * Output formatting for the paclean CLI
 * Provides plain text, JSON, and YAML renderings
 */
import chalk from 'chalk';
import * as YAML from 'yaml';
import { formatPackage } from '../core/identity';
import type { CacheFileEntry, DeletionReport } from '../types';
import type { OutputFormat } from './config';

/**
 * Format bytes into a human-readable string
 */
export function formatBytes(bytes: number): string {
    if (bytes === 0) return '0 B';
    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

export interface SerializedEntry {
    name: string;
    version: string;
    releaseNumber: string;
    architecture: string;
    fileName: string;
    filePath: string;
}

export interface SelectionOutput {
    uninstalled?: SerializedEntry[];
    excess?: SerializedEntry[];
}

export interface DeletionOutput {
    removed: SerializedEntry[];
    missing: SerializedEntry[];
    bytesFreed: number;
}

export function serializeEntry(entry: CacheFileEntry): SerializedEntry {
    return {
        name: entry.name,
        version: entry.version,
        releaseNumber: entry.releaseNumber,
        architecture: entry.architecture,
        fileName: entry.fileName,
        filePath: entry.filePath,
    };
}

/**
 * One canonical `name-version-release` line per entry
 */
export function formatSelectionAsText(entries: readonly CacheFileEntry[]): string[] {
    return entries.map(formatPackage);
}

/**
 * One-line summary after a deletion run
 */
export function formatDeletionSummary(report: DeletionReport): string {
    const parts = [`Removed ${report.removed.length} ${report.removed.length === 1 ? 'file' : 'files'}`];
    if (report.missing.length) {
        parts.push(`${report.missing.length} already gone`);
    }
    parts.push(`${formatBytes(report.bytesFreed)} freed`);
    return parts.join(', ');
}

export function formatDeletionReport(report: DeletionReport): DeletionOutput {
    return {
        removed: report.removed.map(serializeEntry),
        missing: report.missing.map(serializeEntry),
        bytesFreed: report.bytesFreed,
    };
}

/**
 * Format data as JSON
 */
export function formatAsJSON(data: unknown, pretty: boolean = true): string {
    return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as YAML
 */
export function formatAsYAML(data: unknown): string {
    return YAML.stringify(data);
}

/**
 * Render structured output; text lines are returned as-is
 */
export function render(data: SelectionOutput | DeletionOutput, format: Exclude<OutputFormat, 'text'>): string {
    return format === 'yaml' ? formatAsYAML(data) : formatAsJSON(data);
}

/**
 * Heading for a selection in text mode, written to stderr under --verbose
 */
export function selectionHeading(title: string, count: number): string {
    return chalk.bold.cyan(`${title} (${count})`);
}
