export {
	type ListenKeyApi,
	type Session,
	type SessionEvents,
	type SessionManagerDeps,
	SessionManager,
} from "./session-manager.js";
