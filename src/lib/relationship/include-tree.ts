import type { IncludeNode } from '../interface';

/**
 * `"user,organization.positions,organization.positions.level"` →
 * `[user, organization → positions → level]`, in request order with shared prefixes merged.
 */
export function parseIncludes(input: string | readonly string[]): IncludeNode[] {
    const roots: IncludeNode[] = [];
    const paths = typeof input === 'string' ? input.split(',') : input.flatMap((item) => item.split(','));

    for (const path of paths) {
        const segments = path
            .trim()
            .split('.')
            .map((segment) => segment.trim());
        if (segments.some((segment) => segment.length === 0)) {
            continue;
        }

        let level = roots;
        for (const segment of segments) {
            let node = level.find((candidate) => candidate.relation === segment);
            if (!node) {
                node = { relation: segment, nested: [] };
                level.push(node);
            }
            level = node.nested;
        }
    }

    return roots;
}

/**
 * Every path of the tree, prefixes included (`a`, `a.b`, `a.b.c`).
 */
export function flattenIncludePaths(nodes: readonly IncludeNode[], prefix = ''): string[] {
    return nodes.flatMap((node) => {
        const path = prefix ? `${prefix}.${node.relation}` : node.relation;
        return [path, ...flattenIncludePaths(node.nested, path)];
    });
}

export function includeTreeContains(nodes: readonly IncludeNode[], path: string): boolean {
    const [head, ...rest] = path.split('.');
    const node = nodes.find((candidate) => candidate.relation === head);
    if (!node) {
        return false;
    }
    return rest.length === 0 || includeTreeContains(node.nested, rest.join('.'));
}

/**
 * Leaf paths only: `"a.b.c,d"`.
 */
export function stringifyIncludes(nodes: readonly IncludeNode[]): string {
    const paths = flattenIncludePaths(nodes);
    return paths.filter((path) => !paths.some((candidate) => candidate.startsWith(`${path}.`))).join(',');
}
