export interface Tag {
  id: string;
  name: string;
  createdAt?: string;
  updatedAt?: string;
}

export interface TagList {
  data: Tag[];
  nextCursor?: string | null;
}

/** Usually just `{ name }` */
export type TagInput = Record<string, unknown>;
