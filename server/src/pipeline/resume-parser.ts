import type { JsonObject } from '../lib/json.js';

const YEAR_RE = /(?<start>\d{4})(?:\s*[-–—]\s*(?<end>\d{4}|Present|present|Now|now|Current))?/;
const PERCENT_RE = /(\d+(?:\.\d+)?%)/g;
const MONEY_RE = /(\$\s?\d{1,3}(?:,?\d{3})*(?:\.\d+)?)/g;
const NUMBER_RE = /(\d+(?:\+|k|M)?(?:\.\d+)?)\b/g;
const DATE_RANGE_RE = /^\d{4}\s*[-–—]\s*\d{4}$/;
const EMAIL_RE = /([a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+)/;
const PHONE_RE = /(\+?\d[\d\s\-()]{6,}\d)/;
const BULLET_PREFIXES = ['-', '•', '*'];
const OPEN_ENDED = new Set(['present', 'now', 'current']);

const SECTION_ALIASES: Record<string, string[]> = {
  experience: ['experience', 'work experience', 'professional experience', 'employment history', 'work history'],
  skills: ['skills', 'technical skills', 'skills & tools', 'core skills'],
  education: ['education', 'academic', 'qualifications'],
  certifications: ['certifications', 'certificates', 'licenses'],
  projects: ['projects', 'selected projects'],
  summary: ['summary', 'professional summary', 'profile', 'about me'],
};

const ALL_ALIASES = Object.values(SECTION_ALIASES).flat();

export interface ContactInfo {
  name: string | null;
  email: string | null;
  phone: string | null;
  location: string | null;
}

export interface ExperienceMetric {
  type: 'percent' | 'money' | 'number';
  raw: string;
}

export interface ExperienceEntry {
  company: string | null;
  title: string | null;
  start: string | null;
  end: string | null;
  bullets: string[];
  metrics: ExperienceMetric[];
}

export interface SuspiciousClaim {
  text: string;
  reason: string;
  confidence: number;
}

export interface ParsedResume {
  contact: ContactInfo | Record<string, never>;
  skills: string[];
  experience: ExperienceEntry[];
  education: Array<{ text: string }>;
  certs: Array<{ text: string }>;
  suspicious_claims: SuspiciousClaim[];
  original_layout: JsonObject;
  confidence: number;
}

export interface ParseOptions {
  /** Year used to close open-ended ranges. Defaults to the current UTC year. */
  currentYear?: number;
}

function nonEmptyLines(text: string): string[] {
  return text.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
}

function isBullet(line: string): boolean {
  return BULLET_PREFIXES.some((prefix) => line.startsWith(prefix));
}

export function normalizeHeading(heading: string): string {
  const s = heading
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9 &]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  for (const [key, aliases] of Object.entries(SECTION_ALIASES)) {
    if (aliases.some((alias) => s.includes(alias))) return key;
  }
  return s;
}

/**
 * Splits resume text into sections keyed by normalized heading. Text with no
 * recognizable heading comes back as `{ body }`.
 */
export function splitIntoSections(text: string): Record<string, string> {
  const lines = text.split(/\r?\n/).map((l) => l.trimEnd());
  const headings: Array<{ index: number; text: string }> = [];

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed || isBullet(trimmed)) return;

    const words = trimmed.split(/\s+/);
    const low = trimmed.toLowerCase();
    const isUpper = /[A-Z]/.test(trimmed) && trimmed === trimmed.toUpperCase();
    let isHeading = words.length <= 6 && (isUpper || ALL_ALIASES.some((alias) => low.includes(alias)));

    const next = (lines[index + 1] ?? '').trim();
    if (trimmed.endsWith(':') || /^[-=_]{3,}$/.test(next)) {
      isHeading = true;
    }
    if (isHeading) headings.push({ index, text: trimmed });
  });

  if (headings.length === 0) return { body: text };

  const sections: Record<string, string> = {};
  headings.forEach((heading, i) => {
    const end = headings[i + 1]?.index ?? lines.length;
    const body = lines.slice(heading.index + 1, end).join('\n').trim();
    const key = normalizeHeading(heading.text);
    sections[key] = key in sections ? `${sections[key]}\n\n${body}` : body;
  });
  return sections;
}

export function extractContact(text: string): ContactInfo {
  const lines = nonEmptyLines(text);
  if (lines.length === 0) return { name: null, email: null, phone: null, location: null };

  // Contact details sit above the first section heading.
  const headingAt = lines.findIndex((line) => normalizeHeading(line) in SECTION_ALIASES);
  const headerLines = lines.slice(0, headingAt >= 0 ? Math.min(headingAt, 8) : 8);
  const header = headerLines.join('\n');

  const email = EMAIL_RE.exec(header)?.[1] ?? null;
  let phone = PHONE_RE.exec(header)?.[1] ?? null;
  // A date range such as "2019 - 2021" matches the phone pattern.
  if (phone && DATE_RANGE_RE.test(phone.trim())) phone = null;

  let name: string | null = null;
  for (const line of headerLines.slice(0, 4)) {
    if (line.includes('@') || /\d/.test(line)) continue;
    if (line.split(/\s+/).length <= 6 && line.length > 1) {
      name = line;
      break;
    }
  }

  let location: string | null = null;
  for (const line of headerLines.slice(0, 6).reverse()) {
    if (line === name || line.includes('@') || /\d/.test(line)) continue;
    if (line.split(/\s+/).length <= 5) {
      location = line;
      break;
    }
  }

  return { name, email, phone, location };
}

/** Splits a skills block on bullets, newlines and list separators; dedupes case-insensitively. */
export function extractSkills(skillsText: string): string[] {
  if (!skillsText) return [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const part of skillsText.split(/[\n•-]+/)) {
    for (const token of part.split(/[,|;/]+/)) {
      const skill = token.trim().replace(/\s+/g, ' ');
      if (!skill) continue;
      const key = skill.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(skill);
    }
  }
  return out;
}

export function splitExperienceEntries(expText: string): string[] {
  if (!expText) return [];
  const entries: string[] = [];
  const blocks = expText.split(/\n{2,}/).map((b) => b.trim()).filter(Boolean);

  for (const block of blocks) {
    const lines = nonEmptyLines(block);
    // An entry starts at its header line, just above the date range.
    const splitAt = lines.flatMap((line, i) => {
      if (!YEAR_RE.test(line)) return [];
      const prev = lines[i - 1];
      return prev !== undefined && !YEAR_RE.test(prev) && !isBullet(prev) ? [i - 1] : [i];
    });
    if (splitAt.length > 1) {
      splitAt.forEach((start, i) => {
        const chunk = lines.slice(start, splitAt[i + 1] ?? lines.length).join('\n').trim();
        if (chunk) entries.push(chunk);
      });
    } else {
      entries.push(block);
    }
  }
  return entries;
}

function splitHeader(header: string, lines: string[]): { title: string | null; company: string | null } {
  if (header.includes(' at ')) {
    const idx = header.indexOf(' at ');
    return { title: header.slice(0, idx).trim(), company: header.slice(idx + 4).trim() };
  }
  if (header.includes(' - ') || header.includes(' — ')) {
    const parts = header.split(/\s+[-—–]\s+/);
    if (parts.length >= 2) {
      const left = parts[0].trim();
      const right = parts[1].trim();
      if (['Inc', 'LLC', 'Ltd', 'GmbH'].some((suffix) => right.includes(suffix))) {
        return { title: left, company: right };
      }
      // The longer side is usually the company.
      return left.length < right.length
        ? { title: left, company: right }
        : { title: right, company: left };
    }
    return { title: null, company: null };
  }
  if (header.includes(',')) {
    const parts = header.split(',').map((p) => p.trim());
    return { title: parts[0], company: parts[1] };
  }
  if (lines.length >= 2 && YEAR_RE.test(lines[1])) {
    return { title: null, company: lines[0] };
  }
  if (lines.length >= 2) {
    return { title: lines[0], company: lines[1] };
  }
  return { title: header, company: null };
}

function extractMetrics(bullet: string): ExperienceMetric[] {
  const metrics: ExperienceMetric[] = [];
  for (const m of bullet.matchAll(PERCENT_RE)) metrics.push({ type: 'percent', raw: m[1] });
  for (const m of bullet.matchAll(MONEY_RE)) metrics.push({ type: 'money', raw: m[1] });
  for (const m of bullet.matchAll(NUMBER_RE)) metrics.push({ type: 'number', raw: m[1] });
  return metrics;
}

export function parseExperienceEntry(text: string): ExperienceEntry {
  const lines = nonEmptyLines(text);
  const header = lines[0] ?? '';

  let start: string | null = null;
  let end: string | null = null;
  for (const line of lines.slice(0, 2)) {
    const groups = YEAR_RE.exec(line)?.groups;
    if (groups) {
      start = groups.start ?? null;
      end = groups.end ?? null;
      break;
    }
  }
  if (end && OPEN_ENDED.has(end.toLowerCase())) end = null;

  const { title, company } = splitHeader(header, lines);

  const bullets: string[] = [];
  for (const line of lines.slice(1)) {
    if (isBullet(line)) {
      bullets.push(line.replace(/^[-•*\s]+/, '').trim());
    } else if (!YEAR_RE.test(line)) {
      bullets.push(line);
    }
  }

  return {
    company,
    title,
    start,
    end,
    bullets,
    metrics: bullets.flatMap(extractMetrics),
  };
}

/**
 * Flags overlapping year ranges between consecutive jobs and a suspiciously
 * short average tenure.
 */
export function detectSuspiciousClaims(
  experiences: ExperienceEntry[],
  currentYear = new Date().getUTCFullYear(),
): SuspiciousClaim[] {
  const claims: SuspiciousClaim[] = [];
  const ranges: Array<{ start: number; end: number; index: number }> = [];

  experiences.forEach((entry, index) => {
    if (!entry.start || !/^\d+$/.test(entry.start)) return;
    const start = Number(entry.start);
    const end = entry.end && /^\d+$/.test(entry.end) ? Number(entry.end) : currentYear;
    if (start <= end) ranges.push({ start, end, index });
  });

  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  for (let i = 0; i < sorted.length - 1; i++) {
    const a = sorted[i];
    const b = sorted[i + 1];
    if (b.start <= a.end) {
      claims.push({
        text: `Overlapping dates between experiences index ${a.index} and ${b.index}`,
        reason: `Ranges ${a.start}-${a.end} and ${b.start}-${b.end} overlap`,
        confidence: 0.7,
      });
    }
  }

  if (ranges.length > 0) {
    // Same-year stints count as zero years.
    const totalYears = ranges.reduce((sum, r) => sum + (r.end - r.start), 0);
    const avg = totalYears / ranges.length;
    if (avg < 0.5) {
      claims.push({
        text: 'Average job tenure suspiciously low',
        reason: `Average tenure ~${avg.toFixed(2)} years`,
        confidence: 0.6,
      });
    }
  }
  return claims;
}

export function computeConfidence(parsed: Omit<ParsedResume, 'confidence'>): number {
  let score = 0;
  const contact = parsed.contact;
  if ('email' in contact && (contact.email || contact.name)) score += 0.3;
  if (parsed.skills.length > 0) score += 0.25;
  if (parsed.experience.length > 0) score += 0.3;
  if (parsed.education.length > 0) score += 0.05;
  return Math.min(1, Math.round(score * 100) / 100);
}

function lineItems(sectionText: string | undefined): Array<{ text: string }> {
  return sectionText ? nonEmptyLines(sectionText).map((text) => ({ text })) : [];
}

/**
 * Rule-based resume parser used for stage C when extracted text is available.
 */
export function parseResumeText(
  text: string,
  originalLayout: JsonObject = {},
  options: ParseOptions = {},
): ParsedResume {
  if (!text) {
    return {
      contact: {},
      skills: [],
      experience: [],
      education: [],
      certs: [],
      suspicious_claims: [],
      original_layout: originalLayout,
      confidence: 0,
    };
  }

  const sections = splitIntoSections(text);

  let contact = extractContact(text.split(/\r?\n/).slice(0, 8).join('\n'));
  if (!contact.email && !contact.name) {
    if ('summary' in sections) {
      contact = extractContact(sections.summary);
    } else if ('body' in sections) {
      contact = extractContact(sections.body.split(/\r?\n/).slice(0, 8).join('\n'));
    }
  }

  let skills: string[] = [];
  if ('skills' in sections) {
    skills = extractSkills(sections.skills);
  } else {
    const inline = /(Skills[:\s]+)(.+)/i.exec(text);
    if (inline) skills = extractSkills(inline[2]);
  }

  const experience = 'experience' in sections
    ? splitExperienceEntries(sections.experience).map(parseExperienceEntry)
    : text.split(/\n{2,}/).filter((chunk) => YEAR_RE.test(chunk)).map(parseExperienceEntry);

  const parsed: Omit<ParsedResume, 'confidence'> = {
    contact,
    skills,
    experience,
    education: lineItems(sections.education),
    certs: lineItems(sections.certifications),
    suspicious_claims: detectSuspiciousClaims(experience, options.currentYear),
    original_layout: originalLayout,
  };
  return { ...parsed, confidence: computeConfidence(parsed) };
}
