import type { TierRoute } from "../../../libs/http/server.js";
import { accessStateOf } from "../../../libs/http/accessMiddleware.js";

export const GATEWAY_POLICY = {
    "/health": "UNAUTHENTICATED",
    "/peasant": "IDENTIFIED",
    "/king": "PRIVILEGED",
} as const;

export const GATEWAY_ROUTES: TierRoute[] = [
    {
        method: "get",
        path: "/health",
        handler: (_req, res) => {
            res.json({ status: "ok" });
        },
    },
    {
        method: "get",
        path: "/peasant",
        handler: (_req, res) => {
            res.json({ message: "Greetings, Fellow Citizen!" });
        },
    },
    {
        method: "get",
        path: "/king",
        handler: (req, res) => {
            const state = accessStateOf(req);
            res.json({
                message: "Welcome, Your Majesty.",
                ...(state?.tier === "PRIVILEGED" ? { subject: state.subject } : {}),
            });
        },
    },
];
