/**
 * Parser for software_credits files
 *
 * A credits file is free text split into one section per component:
 *
 * ```
 * The following licenses and copyright notices apply to ...
 *
 * === PyYAML (https://pyyaml.org) ==================================
 * Version: 5.4.1
 * Copyright (c) 2017-2021 The PyYAML authors
 * ...
 * ```
 *
 * Text before the first section is the header.
 */

import { UNKNOWN_VERSION } from '../reconciliation/constants';
import type { DocumentedComponentRecord } from '../reconciliation/types';

export interface ParsedSoftwareCredits {
  header: string;
  components: DocumentedComponentRecord[];
  /** True for the "does not include any third party" placeholder file */
  isPlaceholder: boolean;
}

interface SectionHeader {
  name: string;
  url?: string;
}

const SECTION_MARKER = '==';
const HEADER_WITH_URL = /^=+\s*(.+?)\s*\(([^)]+)\)\s*=+/;
const VERSION_LINE = /^[ \t]*version[ \t]*:[ \t]*(\S+)/im;
const TRAILING_VERSION = /^(.+?)\s+(v?\d+(?:\.[0-9A-Za-z]+)*)$/;
const PLACEHOLDER_PHRASE = 'does not include any third';

/**
 * Reads name and url from a section header line.
 *
 * @example
 * parseSectionHeader("=== Requests (https://requests.readthedocs.io) ===")
 * // { name: "Requests", url: "https://requests.readthedocs.io" }
 * parseSectionHeader("== six ==") // { name: "six" }
 */
export function parseSectionHeader(line: string): SectionHeader {
  const match = line.match(HEADER_WITH_URL);
  if (match) {
    return { name: match[1].trim(), url: match[2].trim() };
  }

  return { name: line.replace(/^[=\s]+|[=\s]+$/g, '') };
}

/**
 * Finds the documented version of a section: an explicit "Version:" line
 * in the body wins over a version token at the end of the name.
 */
export function extractVersion(name: string, body: string): { name: string; version: string } {
  const versionLine = body.match(VERSION_LINE);
  if (versionLine) {
    return { name, version: versionLine[1] };
  }

  const trailing = name.match(TRAILING_VERSION);
  if (trailing) {
    return { name: trailing[1], version: trailing[2] };
  }

  return { name, version: UNKNOWN_VERSION };
}

/**
 * True when a section body carries its own "Version:" line.
 */
export function hasVersionLine(body: string): boolean {
  return VERSION_LINE.test(body);
}

function toRecord(headerLine: string, bodyLines: string[]): DocumentedComponentRecord {
  const header = parseSectionHeader(headerLine);
  const body = bodyLines.join('\n');
  const { name, version } = extractVersion(header.name, body);

  return {
    name,
    version,
    ...(header.url ? { url: header.url } : {}),
    rawText: [headerLine, ...bodyLines].join('\n').trimEnd(),
  };
}

/**
 * Checks for the placeholder file used by repositories without third
 * party components.
 */
export function isPlaceholderCredits(content: string): boolean {
  const nonEmptyLines = content.split(/\r?\n/).filter((line) => line.trim()).length;
  return nonEmptyLines <= 3 && content.toLowerCase().includes(PLACEHOLDER_PHRASE);
}

/**
 * Parses the full text of a software_credits file.
 */
export function parseSoftwareCredits(content: string): ParsedSoftwareCredits {
  const headerLines: string[] = [];
  const components: DocumentedComponentRecord[] = [];

  let currentHeader: string | null = null;
  let currentBody: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith(SECTION_MARKER)) {
      if (currentHeader !== null) {
        components.push(toRecord(currentHeader, currentBody));
      }
      currentHeader = line;
      currentBody = [];
    } else if (currentHeader === null) {
      headerLines.push(line);
    } else {
      currentBody.push(line);
    }
  }

  if (currentHeader !== null) {
    components.push(toRecord(currentHeader, currentBody));
  }

  return {
    header: headerLines.join('\n').trim(),
    components,
    isPlaceholder: isPlaceholderCredits(content),
  };
}

export default parseSoftwareCredits;
