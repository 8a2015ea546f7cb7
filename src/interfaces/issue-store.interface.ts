export interface Issue {
  number: number;
  name: string;
  content: string;
  completed: boolean;
  filePath?: string;
  createdAt: Date;
}

export interface IssueStore {
  get(name: string): Promise<Issue>;
  create(name: string, content: string): Promise<Issue>;
  update(name: string, content: string): Promise<Issue>;
  markComplete(name: string): Promise<Issue>;
  list(): Promise<Issue[]>;
}
