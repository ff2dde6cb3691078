import { flattenIncludePaths, includeTreeContains, parseIncludes, stringifyIncludes } from '../lib/relationship/include-tree';

describe('include tree', () => {
    const tree = parseIncludes('user,organization.positions,organization.positions.level');

    it('merges shared prefixes in request order', () => {
        expect(tree).toEqual([
            { relation: 'user', nested: [] },
            {
                relation: 'organization',
                nested: [{ relation: 'positions', nested: [{ relation: 'level', nested: [] }] }],
            },
        ]);
    });

    it('accepts a list of paths and skips empty segments', () => {
        expect(parseIncludes(['a.b', 'a.c', 'a..d', ''])).toEqual([
            {
                relation: 'a',
                nested: [
                    { relation: 'b', nested: [] },
                    { relation: 'c', nested: [] },
                ],
            },
        ]);
    });

    it('lists every path including prefixes', () => {
        expect(flattenIncludePaths(tree)).toEqual(['user', 'organization', 'organization.positions', 'organization.positions.level']);
    });

    it('checks whether a path is part of the tree', () => {
        expect(includeTreeContains(tree, 'user')).toBe(true);
        expect(includeTreeContains(tree, 'organization.positions')).toBe(true);
        expect(includeTreeContains(tree, 'organization.users')).toBe(false);
        expect(includeTreeContains(tree, 'department')).toBe(false);
    });

    it('renders the leaf paths', () => {
        expect(stringifyIncludes(tree)).toBe('user,organization.positions.level');
    });
});
