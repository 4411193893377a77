/**
 * platform/win32.ts
 *
 * Window platform for the Windows desktop. Every Win32 call is made via
 * PowerShell + .NET (System.Windows.Forms for screens, P/Invoke shims
 * for EnumWindows, GetWindowRect, MoveWindow, SetForegroundWindow and
 * ShowWindow).
 *
 * Spawning PowerShell is slow, so the desktop is read in one snapshot
 * (screens, top-level windows in z-order, foreground handle) and reused
 * for `snapshotTtlMs`. setFrame() reads the rectangle back after
 * MoveWindow, since the OS may clamp it (minimum sizes), and stores what
 * was applied in the snapshot so one command sees its own writes.
 */

import { execSync } from 'child_process';
import Ajv from 'ajv';
import { Rect } from '../geometry/rect';
import { PlatformError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { Compass, neighbourScreen, screenForFrame as locateScreen } from './screens';
import { PointerEventSource, ScreenId, ScreenRef, WindowId, WindowPlatform, WindowRef } from './types';

const log = scopedLogger('platform/win32');

// ---------------------------------------------------------------------------
// PowerShell helpers
// ---------------------------------------------------------------------------

export function ps(script: string, timeoutMs = 10000): string {
  // -EncodedCommand takes Base64 of UTF-16LE
  const encoded = Buffer.from(script, 'utf16le').toString('base64');
  try {
    return execSync(
      `powershell -NoProfile -ExecutionPolicy Bypass -EncodedCommand ${encoded}`,
      { encoding: 'utf-8', timeout: timeoutMs, stdio: ['pipe', 'pipe', 'pipe'] }
    ).trim();
  } catch (e: unknown) {
    const stderr = e instanceof Error && 'stderr' in e ? String(e.stderr ?? '') : '';
    const message = e instanceof Error ? e.message : String(e);
    throw new PlatformError('win32', stderr || message);
  }
}

const SNAPSHOT_SCRIPT = `
  Add-Type -AssemblyName System.Windows.Forms;
  Add-Type @'
using System;
using System.Collections.Generic;
using System.Runtime.InteropServices;
public class StepwiseEnum {
  public delegate bool EnumProc(IntPtr hWnd, IntPtr lParam);
  [StructLayout(LayoutKind.Sequential)] public struct RECT { public int Left, Top, Right, Bottom; }
  [DllImport("user32.dll")] public static extern bool EnumWindows(EnumProc cb, IntPtr lParam);
  [DllImport("user32.dll")] public static extern bool IsWindowVisible(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern bool IsIconic(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern int GetWindowTextLength(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern uint GetWindowThreadProcessId(IntPtr hWnd, out uint pid);
  [DllImport("user32.dll")] public static extern IntPtr GetForegroundWindow();
  [DllImport("user32.dll")] public static extern bool GetWindowRect(IntPtr hWnd, out RECT rect);
  public static List<IntPtr> TopLevel() {
    var found = new List<IntPtr>();
    EnumWindows((h, p) => { if (IsWindowVisible(h) && GetWindowTextLength(h) > 0) found.Add(h); return true; }, IntPtr.Zero);
    return found;
  }
}
'@;
  $windows = foreach ($hwnd in [StepwiseEnum]::TopLevel()) {
    $r = New-Object StepwiseEnum+RECT;
    [StepwiseEnum]::GetWindowRect($hwnd, [ref]$r) | Out-Null;
    $procId = 0;
    [StepwiseEnum]::GetWindowThreadProcessId($hwnd, [ref]$procId) | Out-Null;
    $proc = Get-Process -Id $procId -ErrorAction SilentlyContinue;
    [PSCustomObject]@{
      hwnd      = $hwnd.ToInt64();
      app       = $(if ($proc) { $proc.ProcessName } else { 'unknown' });
      x         = $r.Left;
      y         = $r.Top;
      w         = $r.Right - $r.Left;
      h         = $r.Bottom - $r.Top;
      minimized = [StepwiseEnum]::IsIconic($hwnd);
    }
  };
  $screens = foreach ($s in [System.Windows.Forms.Screen]::AllScreens) {
    [PSCustomObject]@{
      name    = $s.DeviceName;
      primary = $s.Primary;
      x       = $s.WorkingArea.X;
      y       = $s.WorkingArea.Y;
      w       = $s.WorkingArea.Width;
      h       = $s.WorkingArea.Height;
    }
  };
  [PSCustomObject]@{
    foreground = [StepwiseEnum]::GetForegroundWindow().ToInt64();
    screens    = @($screens);
    windows    = @($windows);
  } | ConvertTo-Json -Depth 4 -Compress;
`;

const ACTION_PRELUDE = `
  Add-Type @'
using System;
using System.Runtime.InteropServices;
public class StepwiseAct {
  [StructLayout(LayoutKind.Sequential)] public struct RECT { public int Left, Top, Right, Bottom; }
  [DllImport("user32.dll")] public static extern bool GetWindowRect(IntPtr hWnd, out RECT rect);
  [DllImport("user32.dll")] public static extern bool MoveWindow(IntPtr hWnd, int x, int y, int w, int h, bool repaint);
  [DllImport("user32.dll")] public static extern bool SetForegroundWindow(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern bool BringWindowToTop(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern bool ShowWindow(IntPtr hWnd, int cmd);
}
'@;
`;

function readRect(hwnd: number): string {
  return `$r = New-Object StepwiseAct+RECT;
  [StepwiseAct]::GetWindowRect([IntPtr]${hwnd}, [ref]$r) | Out-Null;
  [PSCustomObject]@{ x = $r.Left; y = $r.Top; w = $r.Right - $r.Left; h = $r.Bottom - $r.Top } | ConvertTo-Json -Compress;`;
}

const SW_MINIMIZE = 6;
const SW_RESTORE = 9;

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

interface RawScreen {
  name: string;
  primary: boolean;
  x: number;
  y: number;
  w: number;
  h: number;
}

interface RawWindow {
  hwnd: number;
  app: string;
  x: number;
  y: number;
  w: number;
  h: number;
  minimized: boolean;
}

export interface DesktopSnapshot {
  foreground: number;
  screens: RawScreen[];
  windows: RawWindow[];
}

const snapshotSchema = {
  type: 'object',
  properties: {
    foreground: { type: 'integer' },
    screens: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          primary: { type: 'boolean' },
          x: { type: 'number' },
          y: { type: 'number' },
          w: { type: 'number' },
          h: { type: 'number' }
        },
        required: ['name', 'primary', 'x', 'y', 'w', 'h']
      }
    },
    windows: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          hwnd: { type: 'integer' },
          app: { type: 'string' },
          x: { type: 'number' },
          y: { type: 'number' },
          w: { type: 'number' },
          h: { type: 'number' },
          minimized: { type: 'boolean' }
        },
        required: ['hwnd', 'app', 'x', 'y', 'w', 'h', 'minimized']
      }
    }
  },
  required: ['foreground', 'screens', 'windows']
};

const rectSchema = {
  type: 'object',
  properties: {
    x: { type: 'number' },
    y: { type: 'number' },
    w: { type: 'number' },
    h: { type: 'number' }
  },
  required: ['x', 'y', 'w', 'h']
};

const ajv = new Ajv({ allErrors: true });
const validateSnapshot = ajv.compile<DesktopSnapshot>(snapshotSchema);
const validateRect = ajv.compile<Rect>(rectSchema);

export function parseSnapshot(raw: string): DesktopSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new PlatformError('win32', 'Desktop snapshot is not JSON', { raw: raw.slice(0, 200) });
  }
  if (!validateSnapshot(parsed)) {
    throw new PlatformError('win32', 'Desktop snapshot has an unexpected shape', {
      errors: ajv.errorsText(validateSnapshot.errors)
    });
  }
  return parsed;
}

export function parseRect(raw: string): Rect {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new PlatformError('win32', 'Window rectangle is not JSON', { raw: raw.slice(0, 200) });
  }
  if (!validateRect(parsed)) {
    throw new PlatformError('win32', 'Window rectangle has an unexpected shape', {
      errors: ajv.errorsText(validateRect.errors)
    });
  }
  return { x: parsed.x, y: parsed.y, w: parsed.w, h: parsed.h };
}

// ---------------------------------------------------------------------------
// Refs
// ---------------------------------------------------------------------------

class Win32Screen implements ScreenRef {
  constructor(
    private readonly desktop: Win32Desktop,
    private readonly index: number,
    private readonly raw: RawScreen
  ) {}

  id(): ScreenId { return this.index + 1; }
  name(): string { return this.raw.name; }
  frame(): Rect { return { x: this.raw.x, y: this.raw.y, w: this.raw.w, h: this.raw.h }; }
  isPrimary(): boolean { return this.raw.primary; }

  toWest(): ScreenRef | undefined { return this.desktop.neighbour(this, 'west'); }
  toEast(): ScreenRef | undefined { return this.desktop.neighbour(this, 'east'); }
  toNorth(): ScreenRef | undefined { return this.desktop.neighbour(this, 'north'); }
  toSouth(): ScreenRef | undefined { return this.desktop.neighbour(this, 'south'); }
}

class Win32Window implements WindowRef {
  constructor(
    private readonly desktop: Win32Desktop,
    private readonly raw: RawWindow
  ) {}

  id(): WindowId { return this.raw.hwnd; }
  appName(): string { return this.raw.app; }
  frame(): Rect { return { x: this.raw.x, y: this.raw.y, w: this.raw.w, h: this.raw.h }; }

  setFrame(frame: Rect): void {
    const x = Math.round(frame.x);
    const y = Math.round(frame.y);
    const w = Math.round(frame.w);
    const h = Math.round(frame.h);
    const applied = parseRect(this.desktop.act(
      `[StepwiseAct]::MoveWindow([IntPtr]${this.raw.hwnd}, ${x}, ${y}, ${w}, ${h}, $true) | Out-Null;\n  ${readRect(this.raw.hwnd)}`
    ));
    if (applied.w !== w || applied.h !== h) {
      log.debug({ hwnd: this.raw.hwnd, requested: { x, y, w, h }, applied }, 'Window clamped the requested frame');
    }
    Object.assign(this.raw, applied);
  }

  screenOf(): ScreenRef {
    return this.desktop.screenForFrame(this.frame());
  }

  // EnumWindows already dropped tool windows without a title
  isStandard(): boolean { return true; }
  isVisible(): boolean { return !this.raw.minimized; }

  raise(): void {
    this.desktop.act(`[StepwiseAct]::BringWindowToTop([IntPtr]${this.raw.hwnd}) | Out-Null;`);
  }

  focus(): void {
    this.desktop.act(`[StepwiseAct]::SetForegroundWindow([IntPtr]${this.raw.hwnd}) | Out-Null;`);
    this.desktop.markForeground(this.raw.hwnd);
  }

  minimize(): void {
    this.desktop.act(`[StepwiseAct]::ShowWindow([IntPtr]${this.raw.hwnd}, ${SW_MINIMIZE}) | Out-Null;`);
    this.raw.minimized = true;
  }

  unminimize(): void {
    this.desktop.act(`[StepwiseAct]::ShowWindow([IntPtr]${this.raw.hwnd}, ${SW_RESTORE}) | Out-Null;`);
    this.raw.minimized = false;
  }
}

// ---------------------------------------------------------------------------
// Desktop
// ---------------------------------------------------------------------------

export class Win32Desktop implements WindowPlatform {
  readonly kind = 'win32';

  private snapshot: DesktopSnapshot | undefined;
  private takenAt = 0;
  private screenRefs: Win32Screen[] = [];
  private windowRefs: Win32Window[] = [];

  constructor(
    private readonly snapshotTtlMs = 250,
    private readonly now: () => number = Date.now
  ) {}

  private load(): DesktopSnapshot {
    if (this.snapshot && this.now() - this.takenAt < this.snapshotTtlMs) return this.snapshot;

    const snapshot = parseSnapshot(ps(SNAPSHOT_SCRIPT));
    this.snapshot = snapshot;
    this.takenAt = this.now();
    this.screenRefs = snapshot.screens.map((s, i) => new Win32Screen(this, i, s));
    this.windowRefs = snapshot.windows.map(w => new Win32Window(this, w));
    log.debug({ screens: snapshot.screens.length, windows: snapshot.windows.length }, 'Desktop snapshot taken');
    return snapshot;
  }

  act(statement: string): string {
    return ps(`${ACTION_PRELUDE}\n  ${statement}`);
  }

  markForeground(hwnd: number): void {
    if (this.snapshot) this.snapshot.foreground = hwnd;
  }

  focusedWindow(): WindowRef | undefined {
    const { foreground } = this.load();
    return this.windowRefs.find(w => w.id() === foreground);
  }

  orderedWindows(): WindowRef[] {
    this.load();
    return this.windowRefs.filter(w => w.isVisible());
  }

  windowById(id: WindowId): WindowRef | undefined {
    this.load();
    return this.windowRefs.find(w => w.id() === id);
  }

  allScreens(): ScreenRef[] {
    this.load();
    return [...this.screenRefs];
  }

  primaryScreen(): ScreenRef | undefined {
    this.load();
    return this.screenRefs.find(s => s.isPrimary()) ?? this.screenRefs[0];
  }

  pointerEvents(): PointerEventSource | undefined {
    // a low-level mouse hook needs a resident native process
    return undefined;
  }

  screenForFrame(frame: Rect): ScreenRef {
    this.load();
    const screen = locateScreen(frame, this.screenRefs);
    if (!screen) throw new PlatformError('win32', 'No screens reported');
    return screen;
  }

  neighbour(from: ScreenRef, toward: Compass): ScreenRef | undefined {
    this.load();
    return neighbourScreen(from, this.screenRefs, toward);
  }
}
