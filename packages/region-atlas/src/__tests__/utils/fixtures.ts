/**
 * Test fixtures: listing pages, candidate records, and a complete set of
 * update inputs on disk.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { parentPrefix } from '../../core/codes.js';
import { DEFAULT_LISTING_VERSION, type ListingVersion } from '../../core/constants.js';
import type { SourcePaths } from '../../core/region-atlas-service.js';
import type {
  AdminLevel,
  CandidateRecord,
  CandidateSource,
  RegionAttributes,
} from '../../core/types.js';
import { layoutForVersion, type ListingLayout } from '../../parsers/listing-html.js';

// ============================================================================
// Listing Pages
// ============================================================================

export interface ListingEntry {
  readonly code: number;
  readonly name: string;
  readonly level: AdminLevel;
}

function page(body: string): string {
  return [
    '<html><head><meta http-equiv="Content-Type" content="text/html; charset=utf-8"></head>',
    `<body><div class="TRS_Editor">${body}</div></body></html>`,
  ].join('\n');
}

/**
 * 2014-2015 markup: code span, name span indented by U+3000 per level
 */
export function spanListing(entries: readonly ListingEntry[], extraRows: readonly string[] = []): string {
  const rows = entries.map(
    (entry) =>
      `<p class="MsoNormal"><span lang="EN-US">${entry.code}</span>` +
      `<span>${'\u3000'.repeat(entry.level)}${entry.name}</span></p>`
  );
  return page([...extraRows, ...rows].join('\n'));
}

/**
 * 2013 markup: 3, 5 or 7 &nbsp; between code and name
 */
export function nbspListing(entries: readonly ListingEntry[], extraRows: readonly string[] = []): string {
  const rows = entries.map(
    (entry) =>
      `<p class="MsoNormal">${entry.code}${'&nbsp;'.repeat(2 * entry.level + 1)}${entry.name}</p>`
  );
  return page([...extraRows, ...rows].join('\n'));
}

/**
 * 2012 markup: one table row per division
 */
export function tableListing(entries: readonly ListingEntry[]): string {
  const rows = entries.map(
    (entry) => `<tr><td>${entry.code}</td> <td> ${entry.name}</td></tr>`
  );
  return page(`<table class="MsoNormalTable">\n${rows.join('\n')}\n</table>`);
}

export function renderListing(entries: readonly ListingEntry[], layout: ListingLayout): string {
  switch (layout) {
    case 'span':
      return spanListing(entries);
    case 'nbsp':
      return nbspListing(entries);
    case 'table':
      return tableListing(entries);
  }
}

/**
 * Deterministic PRNG (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const NAME_STEMS = ['东', '西', '南', '北', '安', '平', '清', '新', '长', '永', '和', '宁'];

/**
 * Random province → prefecture → county tree in document order
 */
export function syntheticListing(seed: number): ListingEntry[] {
  const random = seededRandom(seed);
  const pick = (max: number): number => 1 + Math.floor(random() * max);
  const stem = (): string =>
    Array.from({ length: 2 }, () => NAME_STEMS[Math.floor(random() * NAME_STEMS.length)] ?? '中').join('');

  const entries: ListingEntry[] = [];
  const provinces = pick(3);
  for (let p = 1; p <= provinces; p++) {
    const province = (10 + p) * 10000;
    entries.push({ code: province, name: `${stem()}省`, level: 1 });

    const prefectures = pick(3);
    for (let f = 1; f <= prefectures; f++) {
      const prefecture = province + f * 100;
      entries.push({ code: prefecture, name: `${stem()}市`, level: 2 });

      const counties = pick(4);
      for (let c = 1; c <= counties; c++) {
        entries.push({ code: prefecture + c, name: `${stem()}县`, level: 3 });
      }
    }
  }
  return entries;
}

// ============================================================================
// Candidates
// ============================================================================

export interface CandidateFixture extends RegionAttributes {
  readonly nameZh: string;
  readonly level: AdminLevel;
  readonly code?: number | null;
  readonly parentPrefix?: string;
  readonly source?: CandidateSource;
  readonly position?: number;
  readonly sourceKey?: string;
}

/**
 * Candidate with defaults: historical source, position 0, and a parent
 * prefix derived from the code when one is given
 */
export function makeCandidate(fixture: CandidateFixture): CandidateRecord {
  const code = fixture.code ?? null;
  const prefix = fixture.parentPrefix ?? (code === null ? '' : parentPrefix(code, fixture.level));
  return {
    ...fixture,
    source: fixture.source ?? 'historical',
    position: fixture.position ?? 0,
    sourceKey: fixture.sourceKey ?? (code === null ? `${prefix}xx` : String(code)),
    code,
    parentPrefix: prefix,
  };
}

// ============================================================================
// Files
// ============================================================================

export async function createTempDir(prefix = 'region-atlas-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixtureFile(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
}

/**
 * Beijing with one prefecture placeholder and one county
 */
export const SAMPLE_LISTING: readonly ListingEntry[] = [
  { code: 110000, name: '北京市', level: 1 },
  { code: 110100, name: '市辖区', level: 2 },
  { code: 110108, name: '海淀区', level: 3 },
];

export const SAMPLE_STANDARD = [
  'code,name_zh,level,name_pinyin,name_en,alpha,latitude,longitude',
  '110000,北京市,1,,Beijing shi,BJ,39.9,116.4',
  '110108,海淀区,3,,Haidian Qu,,,',
  '',
].join('\n');

export const SAMPLE_SUPPLEMENT = ['code,name_zh,level,name_en', '110108,,,Haidian', ''].join('\n');

export const SAMPLE_HISTORICAL = [
  'C-gbcode,N-hanzi,N-pinyin,N-local,alpha,todate',
  '110000,北京市,Beijing,Beijing shi,BJS,19941231',
  '1101xx,海淀区,Haidian,Beijing: Haidian qu,,19941231',
  '1101xx,崇文区,Chongwen,Beijing: Chongwen qu,,19941231',
  '1101xx,宣武区,Xuanwu,,,19871231',
  '',
].join('\n');

export const SAMPLE_CORRECTIONS = ['code,alpha', '110108,HD', '999999,ZZ', ''].join('\n');

export interface FixtureLayout {
  readonly dataDir: string;
  readonly cacheDir: string;
  readonly outputDir: string;
  readonly sources: SourcePaths;
}

/**
 * Cached listing and every CSV source under `root`
 *
 * Layout: data/ for sources, cache/<release>.html, out/ for results.
 */
export async function writeUpdateFixtures(
  root: string,
  release: ListingVersion = DEFAULT_LISTING_VERSION,
  listing: readonly ListingEntry[] = SAMPLE_LISTING
): Promise<FixtureLayout> {
  const dataDir = join(root, 'data');
  const cacheDir = join(root, 'cache');
  const sources: SourcePaths = {
    standard: join(dataDir, 'gbt_2260-2007.csv'),
    supplement: join(dataDir, 'gbt_2260-2007_sup.csv'),
    historical: join(dataDir, 'citas.csv'),
    corrections: join(dataDir, 'extra.csv'),
  };

  await writeFixtureFile(join(cacheDir, `${release}.html`), renderListing(listing, layoutForVersion(release)));
  await writeFixtureFile(sources.standard, SAMPLE_STANDARD);
  await writeFixtureFile(join(dataDir, 'gbt_2260-2007_sup.csv'), SAMPLE_SUPPLEMENT);
  await writeFixtureFile(sources.historical, SAMPLE_HISTORICAL);
  await writeFixtureFile(join(dataDir, 'extra.csv'), SAMPLE_CORRECTIONS);

  return { dataDir, cacheDir, outputDir: join(root, 'out'), sources };
}
