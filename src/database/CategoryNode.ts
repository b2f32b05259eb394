import { CategoryProblem, RawCategoryNode } from './schemas';

/**
 * CategoryNode - Element of the category tree
 *
 * A node is owned by its parent's `branches` list. The `parent` field is
 * only a back-reference for lookups and is never serialised.
 */
export class CategoryNode {
  readonly name: string;
  readonly note: string;
  parent?: CategoryNode;
  readonly branches: CategoryNode[] = [];
  readonly problems: CategoryProblem[] = [];

  constructor(name: string, note: string = '', parent?: CategoryNode) {
    this.name = name;
    this.note = note;
    this.parent = parent;
  }

  /**
   * Build a tree from a validated category file
   */
  static fromJSON(raw: RawCategoryNode, parent?: CategoryNode): CategoryNode {
    const node = CategoryNode.build(raw);
    node.parent = parent;
    node.link();
    return node;
  }

  private static build(raw: RawCategoryNode): CategoryNode {
    const node = new CategoryNode(raw.name, raw.note ?? '');
    for (const problem of raw.problems ?? []) {
      node.problems.push({ ...problem });
    }
    for (const branch of raw.branches ?? []) {
      node.branches.push(CategoryNode.build(branch));
    }
    return node;
  }

  addBranch(node: CategoryNode): CategoryNode {
    node.parent = this;
    this.branches.push(node);
    return node;
  }

  /**
   * Re-point every descendant's parent at its owner
   */
  link(): void {
    for (const branch of this.branches) {
      branch.parent = this;
      branch.link();
    }
  }

  /**
   * Remove direct branches with the given name
   * @returns true if at least one branch was removed
   */
  removeCategory(name: string): boolean {
    let removed = false;
    for (let i = this.branches.length - 1; i >= 0; i--) {
      if (this.branches[i].name === name) {
        this.branches[i].parent = undefined;
        this.branches.splice(i, 1);
        removed = true;
      }
    }
    return removed;
  }

  /**
   * Depth-first search for a node by name, including this node
   */
  findCategory(name: string): CategoryNode | undefined {
    if (this.name === name) return this;
    for (const branch of this.branches) {
      const found = branch.findCategory(name);
      if (found) return found;
    }
    return undefined;
  }

  /**
   * Number of distinct problems referenced in this subtree
   */
  countProblems(): number {
    const seen = new Set<number>();
    const visit = (node: CategoryNode): void => {
      node.problems.forEach((p) => seen.add(p.pnum));
      node.branches.forEach(visit);
    };
    visit(this);
    return seen.size;
  }

  /**
   * Names from the root down to this node
   */
  getPath(): string[] {
    const names: string[] = [];
    for (let node: CategoryNode | undefined = this; node; node = node.parent) {
      names.unshift(node.name);
    }
    return names;
  }

  toJSON(): RawCategoryNode {
    return {
      name: this.name,
      note: this.note,
      branches: this.branches.map((b) => b.toJSON()),
      problems: this.problems.map((p) => ({ ...p })),
    };
  }
}
