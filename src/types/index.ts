export type AttendanceStatus = 'Present' | 'Absent' | 'NotApplicable' | 'Unknown';

/** What a single table cell shows, as far as attendance is concerned. */
export interface CellContent {
  hasCheck: boolean;
  hasCross: boolean;
  text: string;
}

export interface StudentAttendanceRecord {
  rollNo: string;
  studentName: string;
  section?: string;
  attendanceByDate: Record<string, AttendanceStatus>;
}

/** Subject name -> every record seen for it, in traversal order. */
export type SubjectAggregate = Map<string, StudentAttendanceRecord[]>;

export type WideCell = string | null;

export interface WideAttendanceTable {
  columns: string[];
  dates: string[];
  rows: Array<Record<string, WideCell>>;
}

export interface StatusMarkers {
  check: string;
  cross: string;
}

export interface Control {
  click(): Promise<void>;
  isEnabled(): Promise<boolean>;
}

export interface AutomationDriver {
  open(url: string): Promise<void>;
  locate(selector: string): Promise<Control | null>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  waitForQuiescence(timeoutMs: number): Promise<void>;
  pageContent(): Promise<string>;
  selectOption(label: string, option: string): Promise<void>;
  listOptions(label: string, listboxSelector: string, exclude: string[]): Promise<string[]>;
  closeDropdown(): Promise<void>;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}

export interface StoreClient {
  executeStatement(sql: string): Promise<void>;
  insertRows(tableName: string, rows: Array<Record<string, WideCell>>): Promise<void>;
}

export interface FilterSelection {
  label: string;
  option: string;
}

export interface SectionChoice {
  option: string;
  name: string;
}

export interface TraversalSpec {
  filters: FilterSelection[];
  section: {
    label: string;
    choices: SectionChoice[];
  };
  attendanceType: {
    label: string;
    choices: string[];
  };
  course: {
    label: string;
    listbox: string;
    exclude: string[];
  };
  pagination: {
    next: string;
    previous: string;
    rows: string;
  };
  markers: StatusMarkers;
}

export interface PublishResult {
  subject: string;
  tableName: string;
  rowCount: number;
  inserted: boolean;
}
