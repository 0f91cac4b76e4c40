import type {
  Connectivity,
  ConnectivityListener,
} from "../domain/runtime/connectivity";

export class ConnectivityService implements Connectivity {
  private online: boolean;
  private listeners = new Set<ConnectivityListener>();

  constructor(initialOnline = true) {
    this.online = initialOnline;
  }

  setOnline(online: boolean) {
    if (this.online === online) return;
    this.online = online;
    this.listeners.forEach((listener) => listener(online));
  }

  isOnline(): boolean {
    return this.online;
  }

  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
