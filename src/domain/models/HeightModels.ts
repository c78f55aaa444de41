export interface HeightFieldValue {
  value: string;
}

export interface HeightField {
  name?: string;
  fieldTemplateId?: string;
  label?: HeightFieldValue | null;
  selectValue?: HeightFieldValue | null;
}

export interface HeightTask {
  id: string;
  index: number;
  name: string;
  description?: string | null;
  teamIds?: string[];
  createdUserId?: string | null;
  assigneesIds?: string[];
  parentTaskId?: string | null;
  status?: string | null;
  fields?: HeightField[];
  createdAt?: string | null;
  lastActivityAt?: string | null;
  startedAt?: string | null;
  completedAt?: string | null;
}

export interface HeightUser {
  id: string;
  email?: string | null;
}

export interface HeightTeam {
  id: string;
  name: string;
}

export interface HeightStatus {
  id: string;
  name: string;
}

export interface HeightExport {
  tasks: HeightTask[];
  users: HeightUser[];
  teams: HeightTeam[];
  statuses: HeightStatus[];
}
