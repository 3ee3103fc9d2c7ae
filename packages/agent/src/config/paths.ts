import { LOCAL_FILES } from "@timeline-agent/shared";
import type { AgentConfig } from "../types/index.js";
import * as path from "node:path";

export interface AgentPaths {
	timelineFile: string;
	healthFile: string;
	surveyFile: string;
	/** Primary result file the orchestrator appends to */
	resultsFile: string;
}

export function resolvePaths(config: Pick<AgentConfig, "instanceDir" | "logDir">): AgentPaths {
	return {
		timelineFile: path.join(config.instanceDir, LOCAL_FILES.TIMELINE),
		healthFile: path.join(config.instanceDir, LOCAL_FILES.HEALTH),
		surveyFile: path.join(config.instanceDir, LOCAL_FILES.SURVEY),
		resultsFile: path.join(config.logDir, LOCAL_FILES.RESULTS_LOG),
	};
}
