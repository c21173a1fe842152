export type TrieNode = {
  children: Map<string, TrieNode>;
  isWordEnd: boolean;
};

export type Trie = {
  root: TrieNode;
  size: number;
};

const createNode = (): TrieNode => ({ children: new Map(), isWordEnd: false });

export function createTrie(): Trie {
  return { root: createNode(), size: 0 };
}

export function insertWord(trie: Trie, word: string): void {
  let node = trie.root;
  for (const ch of word.toLowerCase()) {
    let child = node.children.get(ch);
    if (!child) {
      child = createNode();
      node.children.set(ch, child);
    }
    node = child;
  }
  if (!node.isWordEnd) {
    node.isWordEnd = true;
    trie.size += 1;
  }
}

function walk(trie: Trie, text: string): TrieNode | undefined {
  let node = trie.root;
  for (const ch of text.toLowerCase()) {
    const next = node.children.get(ch);
    if (!next) return undefined;
    node = next;
  }
  return node;
}

export function hasPrefix(trie: Trie, prefix: string): boolean {
  return walk(trie, prefix) !== undefined;
}

export function isCompleteWord(trie: Trie, word: string): boolean {
  return walk(trie, word)?.isWordEnd ?? false;
}
