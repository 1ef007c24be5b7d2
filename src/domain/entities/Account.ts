export interface Account {
  id: number;
  documentNumber: string;
  createdAt: string; // ISO timestamp
}
