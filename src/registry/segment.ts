export interface Segment {
  department: string;
  workItemType: string;
}

export function segmentKey(segment: Segment): string {
  return `${segment.department}/${segment.workItemType}`;
}

export function parseSegment(key: string): Segment {
  const slash = key.indexOf('/');
  if (slash < 0) return { department: key, workItemType: '*' };
  return { department: key.slice(0, slash), workItemType: key.slice(slash + 1) };
}

/**
 * Specificity of `pattern` against `segment`: 3 exact, 2 department
 * wildcard, 1 type wildcard, 0 global, -1 no match.
 */
export function segmentMatch(pattern: string, segment: Segment): number {
  if (pattern === '*' || pattern === '*/*') return 0;
  const p = parseSegment(pattern);
  const deptOk = p.department === '*' || p.department === segment.department;
  const typeOk = p.workItemType === '*' || p.workItemType === segment.workItemType;
  if (!deptOk || !typeOk) return -1;
  if (p.department !== '*' && p.workItemType !== '*') return 3;
  if (p.department !== '*') return 2;
  return 1;
}
