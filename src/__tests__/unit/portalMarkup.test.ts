import {
  findClassRow,
  hasEvaluationWarning,
  looksLikeLoginPage,
  parseClassLabel,
  parseGradesList,
  parsePeriodTabs,
  parsePortalTable,
  parseProfile,
  pickPeriodTab,
} from '../../scrapers/portalMarkup';
import type { PeriodTab } from '../../scrapers/portalMarkup';

const SIGNED_IN = `
  <div class="topline"><span class="orgname"><strong> КГУ «Школа-лицей №7» </strong></span></div>
  <nav><div class="profile"><p>Сериков<br>Арман</p></div></nav>`;

const GRADES_LIST = `
  <table class="table table-hover">
    <thead><tr><th>Класс</th><th>Предмет</th><th></th></tr></thead>
    <tbody>
      <tr>
        <td>5 «В»</td>
        <td><strong>Математика</strong><div class="text-muted">Обновленное содержание</div></td>
        <td><a href="/jce/index.php?action=semester2&amp;predmet=411&amp;klass=77">Открыть</a></td>
      </tr>
      <tr><td>6 «А»</td><td>Без ссылки</td><td></td></tr>
      <tr>
        <td>10 А</td>
        <td>Физика <div class="text-muted">Обновленное содержание</div></td>
        <td><a href="/jce/index.php?action=semester2&amp;predmet=512&amp;klass=80">Открыть</a></td>
      </tr>
    </tbody>
  </table>`;

describe('parseProfile', () => {
  it('reads teacher and school from the signed-in header', () => {
    expect(parseProfile(SIGNED_IN)).toEqual({
      teacherName: 'Сериков Арман',
      schoolName: 'КГУ «Школа-лицей №7»',
    });
  });

  it('returns null on the sign-in page', () => {
    expect(parseProfile('<form><input name="usr_password"></form>')).toBeNull();
  });
});

describe('looksLikeLoginPage', () => {
  it('is true only when the password field shows without a profile', () => {
    expect(looksLikeLoginPage('<form><input name="usr_password"></form>')).toBe(true);
    expect(looksLikeLoginPage(SIGNED_IN)).toBe(false);
  });
});

describe('grades list', () => {
  const rows = parseGradesList(GRADES_LIST);

  it('keeps linked rows only, with class label and subject', () => {
    expect(rows).toEqual([
      {
        index: 1,
        className: '5В',
        subject: 'Математика',
        href: '/jce/index.php?action=semester2&predmet=411&klass=77',
      },
      {
        index: 3,
        className: '10А',
        subject: 'Физика',
        href: '/jce/index.php?action=semester2&predmet=512&klass=80',
      },
    ]);
  });

  it('finds a row by link parameter, then by position', () => {
    expect(findClassRow(rows, '512')?.subject).toBe('Физика');
    expect(findClassRow(rows, '1')?.subject).toBe('Математика');
    expect(findClassRow(rows, '2')).toBeUndefined();
    expect(findClassRow(rows, 'chemistry')).toBeUndefined();
  });
});

describe('parseClassLabel', () => {
  it('joins grade number and letter', () => {
    expect(parseClassLabel('5 «В»')).toBe('5В');
    expect(parseClassLabel('11 ә')).toBe('11Ә');
    expect(parseClassLabel('Подготовка')).toBe('Подготовка');
  });
});

describe('period tabs', () => {
  const quarters: PeriodTab[] = [
    { href: '#chetvert_1', text: '1 четверть' },
    { href: '#chetvert_2', text: '2 четверть' },
  ];
  const halves: PeriodTab[] = [
    { href: '#polugodie_1', text: '1 полугодие' },
    { href: '#polugodie_2', text: '2 полугодие' },
  ];

  it('prefers the quarter tab', () => {
    expect(pickPeriodTab('2', quarters)).toBe('#chetvert_2');
  });

  it('falls back to half-year tabs for periods 2 and 4', () => {
    expect(pickPeriodTab('2', halves)).toBe('#polugodie_1');
    expect(pickPeriodTab('4', halves)).toBe('#polugodie_2');
  });

  it('recognises Kazakh half-year tabs', () => {
    const kk: PeriodTab[] = [
      { href: '#half_1', text: '1 жартыжылдық' },
      { href: '#half_2', text: '2 жартыжылдық' },
    ];
    expect(pickPeriodTab('2', kk)).toBe('#half_1');
    expect(pickPeriodTab('4', kk)).toBe('#half_2');
  });

  it('matches on the quarter number, then takes the first tab', () => {
    expect(pickPeriodTab('3', [{ href: '#t1', text: 'Итоги' }, { href: '#t3', text: '3 четверть' }])).toBe('#t3');
    expect(pickPeriodTab('3', halves)).toBe('#polugodie_1');
    expect(pickPeriodTab('1', [])).toBeNull();
  });

  it('reads pill tabs from the page', () => {
    const html = `
      <ul id="pills-tab">
        <li><a data-toggle="pill" href="#chetvert_1"> 1 четверть </a></li>
        <li><a data-toggle="pill" href="/elsewhere">Архив</a></li>
      </ul>`;
    expect(parsePeriodTabs(html)).toEqual([{ href: '#chetvert_1', text: '1 четверть' }]);
  });
});

describe('hasEvaluationWarning', () => {
  it('spots the evaluation-data notice', () => {
    const html =
      '<div class="alert alert-warning">Для начала работы необходимо установить данные оценивания! <a>Перейти</a></div>';
    expect(hasEvaluationWarning(html)).toBe(true);
    expect(hasEvaluationWarning('<div class="alert alert-warning">Другое</div>')).toBe(false);
  });
});

describe('parsePortalTable', () => {
  it('uses the last header row and keeps body cells verbatim', () => {
    const html = `
      <table>
        <thead>
          <tr><th colspan="2">Учащиеся</th><th colspan="2">Сентябрь</th></tr>
          <tr><th>№</th><th>ФИО</th><th>12.09</th><th>Оценка</th></tr>
        </thead>
        <tbody>
          <tr><td>1</td><td> Абенова
            Айгерим</td><td>5</td><td>5</td></tr>
          <tr><td>2</td><td>Борисов Иван</td><td></td></tr>
        </tbody>
      </table>`;

    expect(parsePortalTable(html)).toEqual({
      headers: ['№', 'ФИО', '12.09', 'Оценка'],
      rows: [
        ['1', 'Абенова Айгерим', '5', '5'],
        ['2', 'Борисов Иван', ''],
      ],
    });
  });

  it('collects section points and their maxima from the inputs', () => {
    const html = `
      <table>
        <thead>
          <tr>
            <th>№</th><th>ФИО</th>
            <th>СОР 1 <input type="hidden" id="chetvert_3_razdel_1_max" value="10"></th>
            <th>СОЧ <input type="hidden" id="chetvert_3_razdel_0_max" value="20,5"></th>
          </tr>
        </thead>
        <tbody>
          <tr>
            <td>1</td><td>Абенова Айгерим</td>
            <td><input id="chetvert_3_razdel_1_7" value="9"></td>
            <td><input id="chetvert_3_razdel_0_7" value=" 18 "></td>
          </tr>
          <tr><td>2</td><td>Борисов Иван</td><td></td><td></td></tr>
        </tbody>
      </table>`;

    expect(parsePortalTable(html)).toEqual({
      headers: ['№', 'ФИО', 'СОР 1', 'СОЧ'],
      rows: [
        ['1', 'Абенова Айгерим', '9', '18'],
        ['2', 'Борисов Иван', '', ''],
      ],
      sectionMax: [
        { section: 0, max: 20.5 },
        { section: 1, max: 10 },
      ],
      points: [
        [
          { section: 1, value: '9' },
          { section: 0, value: '18' },
        ],
        [],
      ],
    });
  });

  it('returns an empty table when there is none', () => {
    expect(parsePortalTable('<div>нет</div>')).toEqual({ headers: [], rows: [] });
  });
});
