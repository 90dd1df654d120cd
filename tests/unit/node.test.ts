import { describe, it, expect } from 'vitest';
import { SearchNode, TreeNode } from '../../src/search/node';

describe('SearchNode', () => {
  it('should start without payoff or child', () => {
    const node = new SearchNode<string, string, number>('root', null);
    expect(node.payoff).toBeNull();
    expect(node.child).toBeNull();
    expect(node.principalVariation()).toEqual([]);
  });

  it('should keep only the latest retained child', () => {
    const root = new SearchNode<string, string, number>('root', null);
    const a = new SearchNode<string, string, number>('a', 'to-a');
    const b = new SearchNode<string, string, number>('b', 'to-b');

    root.replaceChild(a);
    root.replaceChild(b);

    expect(root.child).toBe(b);
    expect(root.principalVariation()).toEqual(['to-b']);
  });

  it('should follow the retained chain for the principal variation', () => {
    const root = new SearchNode<string, string, number>('root', null);
    const a = new SearchNode<string, string, number>('a', 'to-a');
    const aa = new SearchNode<string, string, number>('aa', 'to-aa');
    a.replaceChild(aa);
    root.replaceChild(a);

    expect(root.principalVariation()).toEqual(['to-a', 'to-aa']);
  });

  it('should hold the root position by reference', () => {
    const position = { cells: [1, 2, 3] };
    const node = new SearchNode<typeof position, string, number>(position, null);
    expect(node.position).toBe(position);
  });
});

describe('TreeNode', () => {
  it('should keep every added child', () => {
    const root = new TreeNode<string, string, number>('root', null);
    root.addChild(new TreeNode<string, string, number>('a', 'to-a'));
    root.addChild(new TreeNode<string, string, number>('b', 'to-b'));

    expect(root.children.map(child => child.causeAction)).toEqual(['to-a', 'to-b']);
    expect(root.best).toBeNull();
  });

  it('should mark a child as best', () => {
    const root = new TreeNode<string, string, number>('root', null);
    const a = new TreeNode<string, string, number>('a', 'to-a');
    const b = new TreeNode<string, string, number>('b', 'to-b');
    root.addChild(a);
    root.addChild(b);

    root.markBest(b);
    expect(root.best).toBe(b);
    root.markBest(a);
    expect(root.best).toBe(a);
  });

  it('should refuse to mark a node that is not its child', () => {
    const root = new TreeNode<string, string, number>('root', null);
    expect(() => root.markBest(new TreeNode<string, string, number>('x', 'to-x'))).toThrow(
      'Cannot mark a node that is not a child of this node as best'
    );
  });

  it('should follow the best children for the principal variation', () => {
    const root = new TreeNode<string, string, number>('root', null);
    const a = new TreeNode<string, string, number>('a', 'to-a');
    const ab = new TreeNode<string, string, number>('ab', 'to-ab');
    root.addChild(a);
    a.addChild(new TreeNode<string, string, number>('aa', 'to-aa'));
    a.addChild(ab);
    root.markBest(a);
    a.markBest(ab);

    expect(root.principalVariation()).toEqual(['to-a', 'to-ab']);
    expect(root.size()).toBe(4);
  });

  it('should start with an exact bound', () => {
    expect(new TreeNode<string, string, number>('root', null).bound).toBe('exact');
  });
});
