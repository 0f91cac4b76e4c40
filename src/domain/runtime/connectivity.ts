export type ConnectivityListener = (online: boolean) => void;

/** Supplied by the host; the coordinator holds exactly one subscription. */
export interface Connectivity {
  isOnline(): boolean;
  subscribe(listener: ConnectivityListener): () => void;
}
