import { createStore, type StoreApi } from "zustand/vanilla";
import type { ScreenSession } from "@screenflow/metrics-io";

export interface SessionFilters {
  searchQuery: string;
  status: "active" | "completed" | null;
  isPopup: boolean | null;
}

const defaultFilters: SessionFilters = {
  searchQuery: "",
  status: null,
  isPopup: null,
};

export interface ComparisonSelection {
  baselineId: string | null;
  candidateId: string | null;
}

export interface ComparisonPair {
  baseline: ScreenSession;
  candidate: ScreenSession;
}

export interface SessionState {
  // Live sessions, in arrival order
  sessions: ScreenSession[];
  activeSessionId: string | null;
  collecting: boolean;
  // Bumped on every publish; sessions are mutated in place
  revision: number;
  publish: (sessions: readonly ScreenSession[], activeSessionId: string | null) => void;
  setCollecting: (collecting: boolean) => void;

  // Imported baselines, kept apart from live sessions
  importedSessions: ScreenSession[];
  addImportedSessions: (sessions: readonly ScreenSession[]) => void;
  clearImportedSessions: () => void;

  // Filters
  filters: SessionFilters;
  setFilters: (filters: Partial<SessionFilters>) => void;
  clearFilters: () => void;
  getFilteredSessions: () => ScreenSession[];

  // Comparison
  comparison: ComparisonSelection;
  setBaseline: (sessionId: string | null) => void;
  setCandidate: (sessionId: string | null) => void;
  clearComparison: () => void;
  getComparisonPair: () => ComparisonPair | null;

  getSession: (sessionId: string) => ScreenSession | null;
  getAllRoutes: () => string[];
  getSessionsByRoute: (routeName: string) => ScreenSession[];
  isImportedSession: (session: ScreenSession) => boolean;
}

export type SessionStore = StoreApi<SessionState>;

export const createSessionStore = (): SessionStore =>
  createStore<SessionState>()((set, get) => ({
    sessions: [],
    activeSessionId: null,
    collecting: false,
    revision: 0,
    publish: (sessions, activeSessionId) =>
      set((state) => ({
        sessions: [...sessions],
        activeSessionId,
        revision: state.revision + 1,
      })),
    setCollecting: (collecting) => set({ collecting }),

    importedSessions: [],
    addImportedSessions: (sessions) =>
      set((state) => ({
        importedSessions: [...state.importedSessions, ...sessions],
      })),
    clearImportedSessions: () => set({ importedSessions: [] }),

    filters: defaultFilters,
    setFilters: (filters) =>
      set((state) => ({
        filters: { ...state.filters, ...filters },
      })),
    clearFilters: () => set({ filters: defaultFilters }),

    getFilteredSessions: () => {
      const { sessions, filters } = get();
      return sessions.filter((session) => {
        if (filters.searchQuery) {
          const query = filters.searchQuery.toLowerCase();
          if (!session.routeName.toLowerCase().includes(query)) return false;
        }

        if (filters.status === "active" && !session.isActive) return false;
        if (filters.status === "completed" && session.isActive) return false;

        if (filters.isPopup !== null && session.isPopup !== filters.isPopup) {
          return false;
        }

        return true;
      });
    },

    comparison: { baselineId: null, candidateId: null },
    setBaseline: (baselineId) =>
      set((state) => ({ comparison: { ...state.comparison, baselineId } })),
    setCandidate: (candidateId) =>
      set((state) => ({ comparison: { ...state.comparison, candidateId } })),
    clearComparison: () => set({ comparison: { baselineId: null, candidateId: null } }),

    getComparisonPair: () => {
      const { comparison, getSession } = get();
      if (!comparison.baselineId || !comparison.candidateId) return null;

      const baseline = getSession(comparison.baselineId);
      const candidate = getSession(comparison.candidateId);
      if (!baseline || !candidate) return null;
      return { baseline, candidate };
    },

    // Live sessions shadow imported ones with the same id
    getSession: (sessionId) => {
      const { sessions, importedSessions } = get();
      return (
        sessions.find((s) => s.sessionId === sessionId) ??
        importedSessions.find((s) => s.sessionId === sessionId) ??
        null
      );
    },

    getAllRoutes: () => {
      const { sessions } = get();
      const routes = new Set<string>();
      sessions.forEach((session) => routes.add(session.routeName));
      return Array.from(routes).sort();
    },

    getSessionsByRoute: (routeName) => {
      const { sessions } = get();
      return sessions.filter((s) => s.routeName === routeName);
    },

    isImportedSession: (session) => {
      return get().importedSessions.includes(session);
    },
  }));
