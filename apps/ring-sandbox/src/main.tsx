import React, { useEffect, useMemo, useRef, useState } from "react";
import { createRoot } from "react-dom/client";
import { defaultMatchOptions } from "@ringside-kit/combat-core";
import type { CombatOutcome, MatchControllerOptions, MatchSnapshot } from "@ringside-kit/combat-core";
import type { GestureClassifierOptions } from "@ringside-kit/gesture-core";
import {
  describeOutcome,
  describePhase,
  telegraphProgress,
  useBoxingGame,
  type GameError,
} from "@ringside-kit/game-react";
import { createTFJSHandModel, type HandModel } from "@ringside-kit/handtracking-tfjs";

import "./style.css";

type HandRuntime = "mediapipe" | "tfjs";
type EventLogEntry = { id: number; at: number; outcome: CombatOutcome };

const EVENT_LOG_LIMIT = 25;

function useHandModel(enabled: boolean, runtime: HandRuntime) {
  const [model, setModel] = useState<HandModel | null>(null);
  const [status, setStatus] = useState<"idle" | "loading" | "ready" | "error">("idle");

  useEffect(() => {
    let cancelled = false;
    if (!enabled) {
      setModel(null);
      setStatus("idle");
      return;
    }
    setStatus("loading");
    createTFJSHandModel({ runtime, modelType: runtime === "tfjs" ? "full" : "lite" })
      .then((m) => {
        if (!cancelled) {
          setModel(m);
          setStatus("ready");
        }
      })
      .catch((err) => {
        console.error(err);
        if (!cancelled) setStatus("error");
      });
    return () => {
      cancelled = true;
    };
  }, [enabled, runtime]);

  return { model, status };
}

function App() {
  const [cameraEnabled, setCameraEnabled] = useState(false);
  const [runtime, setRuntime] = useState<HandRuntime>("mediapipe");
  const [showDebug, setShowDebug] = useState(false);
  const [lastError, setLastError] = useState<string | null>(null);
  const [eventLog, setEventLog] = useState<EventLogEntry[]>([]);
  const ringRef = useRef<HTMLDivElement>(null);
  const { model, status } = useHandModel(cameraEnabled, runtime);

  const gestureOptions = useMemo<GestureClassifierOptions>(() => ({ mirrorX: true }), []);
  const matchOptions = useMemo<MatchControllerOptions>(() => ({}), []);

  const toggleFullscreen = () => {
    const el = ringRef.current;
    if (!el) return;
    const pending = document.fullscreenElement ? document.exitFullscreen() : el.requestFullscreen();
    pending.catch((err) => console.error("Fullscreen toggle failed", err));
  };

  const handleError = (err: GameError) => {
    setLastError(describeError(err));
    console.error("Game error", err);
  };

  const handleQuit = () => {
    setCameraEnabled(false);
    if (document.fullscreenElement) {
      document.exitFullscreen().catch((err) => console.error("Fullscreen exit failed", err));
    }
  };

  const { videoRef, overlayRef, snapshot, droppedFrames, dispatch } = useBoxingGame({
    model,
    fps: runtime === "tfjs" ? 15 : 30,
    debug: showDebug,
    gestureOptions,
    matchOptions,
    onError: handleError,
    onFullscreenToggle: toggleFullscreen,
    onQuit: handleQuit,
  });

  const eventSeq = snapshot.lastEvent?.seq;
  const eventOutcome = snapshot.lastEvent?.outcome;
  const eventIdRef = useRef(0);
  useEffect(() => {
    if (eventSeq === undefined || !eventOutcome) return;
    const entry = { id: ++eventIdRef.current, at: Date.now(), outcome: eventOutcome };
    setEventLog((prev) => [entry, ...prev].slice(0, EVENT_LOG_LIMIT));
  }, [eventSeq, eventOutcome]);

  useEffect(() => {
    if (snapshot.phase === "TITLE") setEventLog([]);
  }, [snapshot.phase]);

  const banner = snapshot.quitRequested ? "Thanks for playing" : describePhase(snapshot);

  return (
    <div className="app">
      <header className="hud">
        <div>
          <strong>Ring Sandbox</strong>
          <div className="sub">
            Punch, guard your face to block, lean to dodge. Space starts, B blocks, F toggles fullscreen.
          </div>
        </div>
        <div className="controls">
          <button onClick={() => setCameraEnabled((v) => !v)}>
            {cameraEnabled ? "Disable camera" : "Enable camera"}
          </button>
          <button onClick={() => setShowDebug((v) => !v)}>{showDebug ? "Hide debug" : "Show debug"}</button>
          <label className="badge">
            Runtime{" "}
            <select
              value={runtime}
              onChange={(e) => setRuntime(parseRuntime(e.target.value))}
              disabled={cameraEnabled}
            >
              <option value="mediapipe">Mediapipe</option>
              <option value="tfjs">TFJS</option>
            </select>
          </label>
          <span className={`badge status-${status}`}>Model: {status}</span>
          {lastError && <span className="badge error">Error: {lastError}</span>}
        </div>
      </header>

      <div className="ring">
        <div className="card" ref={ringRef}>
          <div className="video-shell">
            <video ref={videoRef} className="video-feed" muted playsInline />
            <canvas ref={overlayRef} className="video-overlay" />
            {banner && <div className="banner">{banner}</div>}
          </div>
          <div className="controls">
            <button onClick={() => dispatch({ type: "START" })} disabled={!canStart(snapshot)}>
              {snapshot.phase === "ROUND_END" ? "Next round" : "Start"}
            </button>
            <button
              onClick={() => dispatch({ type: "RESTART" })}
              disabled={snapshot.phase !== "VICTORY" && snapshot.phase !== "GAME_OVER"}
            >
              Restart
            </button>
            <button onClick={() => dispatch({ type: "QUIT" })}>Quit</button>
            <button onClick={toggleFullscreen}>Fullscreen</button>
          </div>
        </div>

        <div className="card">
          <div className="bars">
            <HealthBar label="You" hp={snapshot.playerHp} max={snapshot.playerMaxHp} />
            <HealthBar label="Opponent" hp={snapshot.opponentHp} max={snapshot.opponentMaxHp} opponent />
            <div>
              <div className="bar-label">
                <span>Wind-up</span>
                <span>{snapshot.opponent.attackSide ?? "—"}</span>
              </div>
              <div className="bar">
                <div
                  className="bar-fill telegraph"
                  style={{ width: `${Math.round(telegraphProgress(snapshot.opponent) * 100)}%` }}
                />
              </div>
            </div>
          </div>

          <div className="card-head">
            <span>Round {snapshot.round}</span>
            <div className="pips">
              {Array.from({ length: defaultMatchOptions.maxRounds }, (_, i) => (
                <span key={i} className="pip" data-winner={snapshot.rounds[i] ?? "none"} />
              ))}
            </div>
          </div>

          <div className="metrics-grid">
            <div className="metric">
              <div className="metric-label">Phase</div>
              <div className="metric-value">{snapshot.phase}</div>
            </div>
            <div className="metric">
              <div className="metric-label">Opponent</div>
              <div className="metric-value">{snapshot.opponent.state}</div>
            </div>
            <div className="metric">
              <div className="metric-label">Your action</div>
              <div className="metric-value">{snapshot.action}</div>
            </div>
            <div className="metric">
              <div className="metric-label">Round time</div>
              <div className="metric-value">{formatSeconds(snapshot.roundElapsedMs)}</div>
            </div>
            {showDebug && (
              <div className="metric">
                <div className="metric-label">Dropped frames</div>
                <div className="metric-value">{droppedFrames}</div>
              </div>
            )}
          </div>

          <div className="card-head">
            <span>Exchanges (last {EVENT_LOG_LIMIT})</span>
          </div>
          <div className="log-list">
            {eventLog.length === 0 && <div className="log-empty">No exchanges yet.</div>}
            {eventLog.map((entry) => (
              <div key={entry.id} className="log-row">
                <span className="log-time">{formatTime(entry.at)}</span>
                <span>{describeOutcome(entry.outcome)}</span>
              </div>
            ))}
          </div>
        </div>
      </div>
    </div>
  );
}

function HealthBar({ label, hp, max, opponent }: { label: string; hp: number; max: number; opponent?: boolean }) {
  const pct = max > 0 ? Math.round((hp / max) * 100) : 0;
  return (
    <div>
      <div className="bar-label">
        <span>{label}</span>
        <span>
          {hp} / {max}
        </span>
      </div>
      <div className="bar">
        <div className={opponent ? "bar-fill opponent" : "bar-fill"} style={{ width: `${pct}%` }} />
      </div>
    </div>
  );
}

function canStart(snapshot: MatchSnapshot): boolean {
  return snapshot.phase === "TITLE" || snapshot.phase === "ROUND_END";
}

function parseRuntime(value: string): HandRuntime {
  return value === "tfjs" ? "tfjs" : "mediapipe";
}

function formatSeconds(ms: number) {
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatTime(at: number) {
  return new Date(at).toLocaleTimeString([], { hour12: false });
}

function describeError(err: GameError): string {
  if (err.type === "model-init-failed") {
    const message = err.error instanceof Error ? err.error.message : String(err.error ?? "");
    return message ? `model-init-failed: ${message}` : "model-init-failed";
  }
  return err.type;
}

const root = document.getElementById("root");
if (root) {
  createRoot(root).render(<App />);
}
