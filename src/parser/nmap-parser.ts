/**
 * portwatch — Nmap XML パーサー
 *
 * nmap -sV -oX - の出力を解析し、ポートごとの ProbeOutcome を返す。
 * fast-xml-parser を使用して XML をパースする。
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { ProbeOutcome, ServiceFingerprint } from '../types/engine.js';

// ============================================================
// XML パース後の型定義（unknown から安全に取り出すための構造）
// ============================================================

interface NmapAddress {
  '@_addr': string;
  '@_addrtype': string;
}

interface NmapPortState {
  '@_state': string;
  '@_reason'?: string;
}

interface NmapServiceAttr {
  '@_name'?: string;
  '@_product'?: string;
  '@_version'?: string;
  '@_extrainfo'?: string;
}

interface NmapPort {
  '@_protocol': string;
  '@_portid': string;
  state?: NmapPortState;
  service?: NmapServiceAttr;
}

interface NmapHost {
  address?: NmapAddress | NmapAddress[];
  ports?: {
    port?: NmapPort | NmapPort[];
  };
}

interface NmapRun {
  nmaprun?: {
    host?: NmapHost | NmapHost[];
  };
}

// ============================================================
// ユーティリティ
// ============================================================

/** 値を配列に正規化する。undefined/null は空配列を返す。 */
function ensureArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function clean(value: string | undefined): string {
  return value === undefined ? '' : String(value).trim();
}

/**
 * service, product, version, extrainfo からバナー文字列を合成する。
 * 形式: `service [product] [version] [(extrainfo)]`（空のフィールドは省略）
 */
export function formatBanner(fingerprint: ServiceFingerprint): string {
  const parts: string[] = [clean(fingerprint.name) || 'unknown'];
  const product = clean(fingerprint.product);
  const version = clean(fingerprint.version);
  const extrainfo = clean(fingerprint.extrainfo);
  if (product) parts.push(product);
  if (version) parts.push(version);
  if (extrainfo) parts.push(`(${extrainfo})`);
  return parts.join(' ').trim();
}

function hostMatches(host: NmapHost, address: string | undefined): boolean {
  if (address === undefined) return true;
  return ensureArray(host.address).some((a) => a['@_addr'] === address);
}

// ============================================================
// メインパーサー
// ============================================================

/**
 * nmap XML 出力をパースし、ポート番号 → ProbeOutcome の Map を返す。
 * XML に現れたポートのみを含む。address を指定した場合はそのホストのみ対象。
 *
 * @throws XML として不正な場合
 */
export function parseNmapServices(xml: string, address?: string): Map<number, ProbeOutcome> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new Error(
      `invalid nmap XML at line ${validation.err.line}: ${validation.err.msg}`,
    );
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    allowBooleanAttributes: true,
  });

  const parsed: unknown = parser.parse(xml);
  const nmapRun = parsed as NmapRun;

  const outcomes = new Map<number, ProbeOutcome>();
  const hosts = ensureArray(nmapRun.nmaprun?.host).filter((h) => hostMatches(h, address));

  for (const host of hosts) {
    for (const port of ensureArray(host.ports?.port)) {
      const portNumber = Number(port['@_portid']);
      if (!Number.isInteger(portNumber)) continue;
      // tcp が優先（同一番号の udp 結果で上書きしない）
      if (outcomes.has(portNumber) && port['@_protocol'] !== 'tcp') continue;
      outcomes.set(portNumber, processPort(port));
    }
  }

  return outcomes;
}

/**
 * 単一の port 要素を ProbeOutcome に変換する。
 */
function processPort(port: NmapPort): ProbeOutcome {
  const state = clean(port.state?.['@_state']) || 'unknown';
  if (state !== 'open') {
    return { kind: 'closed', state };
  }
  const service = port.service;
  return {
    kind: 'open',
    banner: formatBanner({
      name: service?.['@_name'],
      product: service?.['@_product'],
      version: service?.['@_version'],
      extrainfo: service?.['@_extrainfo'],
    }),
  };
}
