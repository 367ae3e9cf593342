import chalk from 'chalk'
import type { ResultRecord } from '../providers/types.js'

const EMPTY = '-'

/**
 * `01. Name | Address | rating=- | 420m`
 */
export function formatRecordLine(position: number, record: ResultRecord): string {
  const index = String(position).padStart(2, '0')
  // OSM has no ratings; the column stays for parity with the record shape
  return `${index}. ${record.name ?? EMPTY} | ${record.address ?? EMPTY} | rating=${EMPTY} | ${record.distance_m}m`
}

export function formatSection(title: string, records: ResultRecord[]): string {
  const heading = chalk.bold(`--- ${title} ---`)
  if (records.length === 0) {
    return `${heading}\n${chalk.dim('(no results)')}`
  }
  return [heading, ...records.map((record, i) => formatRecordLine(i + 1, record))].join('\n')
}
