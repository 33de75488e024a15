import type {
  ColumnDefinition,
  ColumnType,
  EntityDefinition,
  EntityType,
  ReferenceDefinition,
} from '../types/loader.js';

const WEEKDAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const schoolRef: ReferenceDefinition = {
  entity: 'school',
  column: 'school_id',
  key: ['school_name'],
  fallbackToPrimary: true,
};

const schoolContext: ReferenceDefinition = { ...schoolRef, contextOnly: true };

const gradeRef: ReferenceDefinition = {
  entity: 'grade',
  column: 'grade_id',
  key: ['school_id', 'grade_name'],
};

const sectionRef: ReferenceDefinition = {
  entity: 'section',
  column: 'section_id',
  key: ['grade_id', 'section_name'],
};

const subjectRef: ReferenceDefinition = {
  entity: 'subject',
  column: 'subject_id',
  key: ['school_id', 'subject_name'],
  hintField: 'subject_id_hint',
};

const teacherRef: ReferenceDefinition = {
  entity: 'teacher',
  column: 'teacher_id',
  key: ['teacher_email'],
  hintField: 'teacher_id_hint',
};

const studentRef: ReferenceDefinition = {
  entity: 'student',
  column: 'student_id',
  key: ['student_email'],
  hintField: 'student_id_hint',
};

function text(name: string, extra: Omit<ColumnDefinition, 'name' | 'type'> = {}): ColumnDefinition {
  return { name, type: 'text', ...extra };
}

function column(name: string, type: ColumnType, extra: Omit<ColumnDefinition, 'name' | 'type'> = {}): ColumnDefinition {
  return { name, type, ...extra };
}

const personColumns: ColumnDefinition[] = [
  text('first_name', { required: true }),
  text('middle_name'),
  text('last_name'),
  text('profile_pic_location'),
  text('gender'),
  column('date_of_birth', 'date'),
  text('mobile_number'),
  text('email', { required: true }),
  text('communication_address'),
  text('languages_known'),
];

const feeColumns: ColumnDefinition[] = [
  'tuition_fee',
  'admission_fee',
  'development_fee',
  'activity_fee',
  'lab_fee',
  'transportation_fee',
  'late_fee_penalty',
  'annual_event_fee',
  'examination_fee',
  'other_fee',
].map((name) => column(name, 'decimal', { hasDefault: true }));

const payColumns: ColumnDefinition[] = [
  column('basic_pay', 'decimal', { required: true }),
  column('allowances', 'decimal', { hasDefault: true }),
  column('deductions', 'decimal', { hasDefault: true }),
];

export const ENTITY_CATALOG: Record<EntityType, EntityDefinition> = {
  school: {
    type: 'school',
    sheet: 'schools',
    table: 'ss_t_schools',
    idColumn: 'school_id',
    required: true,
    columns: [
      text('school_name', { required: true }),
      text('profile_pic_location'),
      text('address'),
      text('primary_phone_number'),
      text('secondary_phone_number'),
      text('email'),
      column('established_year', 'integer'),
      text('medium_of_instruction'),
      text('principal_head_name'),
      text('administrative_contact'),
      column('number_of_staff', 'integer'),
      column('is_active', 'boolean', { hasDefault: true }),
    ],
    references: [],
    naturalKey: ['school_name'],
  },
  grade: {
    type: 'grade',
    sheet: 'grades',
    table: 'ss_t_grades',
    idColumn: 'grade_id',
    required: true,
    columns: [
      text('grade_name', { required: true }),
      text('description'),
      ...feeColumns,
      text('payment_methods_accepted', { hasDefault: true }),
    ],
    references: [schoolRef],
    naturalKey: ['school_id', 'grade_name'],
  },
  section: {
    type: 'section',
    sheet: 'sections',
    table: 'ss_t_sections',
    idColumn: 'section_id',
    required: true,
    columns: [text('section_name', { required: true }), column('capacity', 'integer', { hasDefault: true })],
    references: [schoolContext, gradeRef],
    naturalKey: ['grade_id', 'section_name'],
  },
  subject: {
    type: 'subject',
    sheet: 'subjects',
    table: 'ss_t_subjects',
    idColumn: 'subject_id',
    required: true,
    columns: [text('subject_name', { required: true })],
    references: [schoolRef],
    naturalKey: ['school_id', 'subject_name'],
    hintField: 'subject_id_hint',
  },
  teacher: {
    type: 'teacher',
    sheet: 'teachers',
    table: 'ss_t_teachers',
    idColumn: 'teacher_id',
    required: true,
    columns: [...personColumns, column('is_active', 'boolean', { hasDefault: true })],
    references: [schoolRef],
    naturalKey: ['email'],
    hintField: 'teacher_id_hint',
  },
  student: {
    type: 'student',
    sheet: 'students',
    table: 'ss_t_students',
    idColumn: 'student_id',
    required: true,
    columns: [...personColumns, text('guardian_name'), text('guardian_mobile')],
    references: [schoolRef, gradeRef, sectionRef],
    naturalKey: ['email'],
    hintField: 'student_id_hint',
  },
  teacherSubject: {
    type: 'teacherSubject',
    sheet: 'teacher_subjects',
    table: 'ss_t_teacher_subject',
    idColumn: 'teacher_subject_id',
    required: false,
    columns: [],
    references: [schoolContext, teacherRef, subjectRef],
    naturalKey: ['teacher_id', 'subject_id'],
  },
  teacherGradeSection: {
    type: 'teacherGradeSection',
    sheet: 'teacher_grade_section',
    table: 'ss_t_teacher_grade_section',
    idColumn: 'teacher_grade_section_id',
    required: false,
    columns: [],
    references: [schoolContext, teacherRef, gradeRef, sectionRef],
    naturalKey: ['teacher_id', 'grade_id', 'section_id'],
  },
  timeslot: {
    type: 'timeslot',
    sheet: 'timeslots',
    table: 'ss_t_timeslots',
    idColumn: 'timeslot_id',
    required: false,
    columns: [
      text('day_of_week', { required: true, values: WEEKDAYS }),
      column('period_number', 'integer', { required: true }),
      column('start_time', 'time', { required: true }),
      column('end_time', 'time', { required: true }),
    ],
    references: [],
    naturalKey: ['day_of_week', 'period_number'],
  },
  timetableEntry: {
    type: 'timetableEntry',
    sheet: 'timetable',
    table: 'ss_t_timetable',
    idColumn: 'timetable_id',
    required: false,
    columns: [text('room_number'), column('is_active', 'boolean', { hasDefault: true })],
    references: [
      schoolContext,
      gradeRef,
      sectionRef,
      { entity: 'timeslot', column: 'timeslot_id', key: ['day_of_week', 'period_number'] },
      { ...subjectRef, optional: true },
      { ...teacherRef, optional: true },
    ],
    naturalKey: ['grade_id', 'section_id', 'timeslot_id'],
  },
  attendanceRecord: {
    type: 'attendanceRecord',
    sheet: 'attendance',
    table: 'ss_t_attendance',
    idColumn: 'attendance_id',
    required: false,
    columns: [
      column('attendance_date', 'date', { required: true, aliases: ['date'] }),
      text('status', { required: true, values: ['Present', 'Absent'] }),
    ],
    references: [studentRef],
    naturalKey: ['student_id', 'attendance_date'],
  },
  homework: {
    type: 'homework',
    sheet: 'homework',
    table: 'ss_t_homework_details',
    idColumn: 'homework_id',
    required: false,
    columns: [
      text('title', { required: true }),
      text('more_details'),
      column('assigned_date', 'date', { required: true }),
      column('due_date', 'date'),
      text('status', { hasDefault: true, values: ['Pending', 'Submitted', 'Completed'] }),
    ],
    references: [schoolContext, teacherRef, gradeRef, sectionRef, subjectRef],
    naturalKey: ['grade_id', 'section_id', 'subject_id', 'title', 'assigned_date'],
  },
  classDiaryEntry: {
    type: 'classDiaryEntry',
    sheet: 'class_diary',
    table: 'ss_t_class_diary',
    idColumn: 'diary_id',
    required: false,
    columns: [
      column('entry_date', 'date', { required: true, aliases: ['date'] }),
      text('title', { required: true }),
      text('description'),
    ],
    references: [schoolContext, teacherRef, gradeRef, sectionRef, subjectRef],
    naturalKey: ['grade_id', 'section_id', 'subject_id', 'entry_date', 'title'],
  },
  feesSummary: {
    type: 'feesSummary',
    sheet: 'fees_summary',
    table: 'ss_t_fees_summary',
    idColumn: 'fee_id',
    required: false,
    columns: [
      column('total_fee', 'decimal', { required: true }),
      column('concession', 'decimal', { hasDefault: true }),
      column('net_payable', 'decimal', { required: true }),
      column('amount_paid', 'decimal', { hasDefault: true }),
    ],
    references: [studentRef],
    naturalKey: ['student_id'],
  },
  installment: {
    type: 'installment',
    sheet: 'installments',
    table: 'ss_t_installments',
    idColumn: 'installment_id',
    required: false,
    columns: [
      column('installment_no', 'integer', { required: true }),
      column('amount', 'decimal', { required: true }),
      column('due_date', 'date'),
      column('paid_date', 'date'),
      text('paid_status', { hasDefault: true, values: ['Pending', 'Paid', 'Partial'] }),
    ],
    references: [
      { ...studentRef, contextOnly: true },
      { entity: 'feesSummary', column: 'fee_id', key: ['student_id'] },
    ],
    naturalKey: ['fee_id', 'installment_no'],
  },
  salaryStructure: {
    type: 'salaryStructure',
    sheet: 'salary_structure',
    table: 'ss_t_teacher_salary_structure',
    idColumn: 'structure_id',
    required: false,
    columns: payColumns,
    references: [teacherRef],
    naturalKey: ['teacher_id'],
  },
  payslip: {
    type: 'payslip',
    sheet: 'salary_payslips',
    table: 'ss_t_teacher_salary_payslip',
    idColumn: 'payslip_id',
    required: false,
    columns: [
      column('year', 'integer', { required: true }),
      column('month', 'integer', { required: true }),
      ...payColumns,
      column('net_pay', 'decimal', { required: true }),
    ],
    references: [teacherRef],
    naturalKey: ['teacher_id', 'year', 'month'],
  },
};

/** Topological order of the dependency graph, parents before children. */
export const LOAD_ORDER: readonly EntityType[] = [
  'school',
  'grade',
  'section',
  'subject',
  'teacher',
  'student',
  'teacherSubject',
  'teacherGradeSection',
  'timeslot',
  'timetableEntry',
  'attendanceRecord',
  'homework',
  'classDiaryEntry',
  'feesSummary',
  'installment',
  'salaryStructure',
  'payslip',
];

export function getEntity(type: EntityType): EntityDefinition {
  return ENTITY_CATALOG[type];
}

/** Type of a column; reference columns hold generated ids. */
export function columnType(entity: EntityDefinition, name: string): ColumnType {
  const own = entity.columns.find((candidate) => candidate.name === name);
  if (own) return own.type;
  if (entity.references.some((reference) => reference.column === name)) return 'integer';
  throw new Error(`${entity.type}: column ${name} is not declared`);
}

export function findColumn(entity: EntityDefinition, name: string): ColumnDefinition | undefined {
  return entity.columns.find((candidate) => candidate.name === name);
}

/**
 * Sheet fields read for an entity: its own columns plus every reference key
 * field not produced by an earlier reference.
 */
export function sheetFields(entity: EntityDefinition): string[] {
  const fields = entity.columns.map((candidate) => candidate.name);
  const resolved = new Set<string>();
  for (const reference of entity.references) {
    for (const field of reference.key) {
      if (!resolved.has(field) && !fields.includes(field)) {
        fields.push(field);
      }
    }
    resolved.add(reference.column);
  }
  return fields;
}
