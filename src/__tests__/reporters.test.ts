import gtkSettings from '../reporters/gtk_settings';
import gtkStyles from '../reporters/gtk_styles';
import gnomeSettings, { formatPreference } from '../reporters/gnome_settings';
import xDisplay from '../reporters/x_display';
import xResources from '../reporters/x_resources';
import xSettings, { INSTALL_HINT } from '../reporters/xsettings';
import fontconfig, { buildFontQuery, resolveDescription } from '../reporters/fontconfig';
import { FcPattern } from '../core/parser/fc_pattern';
import { parseFontDescription } from '../core/parser/font_description';
import { PreconditionError } from '../core/errors';
import { FakeFonts, FakePreferences, FakeToolkit, fakeContext } from './helpers/fakes';

describe('GtkSettings reporter', () => {
  it('prints every toolkit setting in catalog order', async () => {
    const toolkit = new FakeToolkit({
      'gtk-font-name': { kind: 'string', value: 'Cantarell 11' },
      'gtk-xft-antialias': { kind: 'int', value: 1 },
      'gtk-xft-hinting': { kind: 'int', value: -1 },
      'gtk-xft-hintstyle': { kind: 'string', value: 'hintslight' },
      'gtk-xft-dpi': { kind: 'int', value: 98304 }
    });

    const section = await gtkSettings.run(fakeContext({ toolkit }));
    expect(section.title).toBe('GtkSettings:');
    expect(section.rows).toEqual([
      'gtk-font-name        "Cantarell 11"',
      'gtk-xft-antialias    1 (yes)',
      'gtk-xft-hinting      -1 (default)',
      'gtk-xft-hintstyle    "hintslight"',
      'gtk-xft-rgba         [unset]',
      'gtk-xft-dpi          98304 (96.00 DPI)'
    ]);
  });

  it('copes with values of unexpected types', async () => {
    const toolkit = new FakeToolkit({
      'gtk-font-name': { kind: 'int', value: 3 },
      'gtk-xft-antialias': { kind: 'bool', value: true },
      'gtk-xft-hinting': { kind: 'string', value: 'on' },
      'gtk-xft-dpi': { kind: 'other', text: '<GdkRGBA>' }
    });

    const { rows } = await gtkSettings.run(fakeContext({ toolkit }));
    expect(rows[0]).toBe('gtk-font-name        3');
    expect(rows[1]).toBe('gtk-xft-antialias    1 (yes)');
    expect(rows[2]).toBe('gtk-xft-hinting      [unknown type]');
    expect(rows[5]).toBe('gtk-xft-dpi          [unknown type]');
  });
});

describe('GTK styles reporter', () => {
  it('prints the theme font of each widget and releases every widget', async () => {
    const toolkit = new FakeToolkit({}, { 'label': 'Cantarell 11', 'menu-item': 'Cantarell Bold 11' });

    const section = await gtkStyles.run(fakeContext({ toolkit }));
    expect(section.title).toBe('GTK 3.24 styles:');
    expect(section.rows).toEqual([
      'GtkLabel             "Cantarell 11"',
      'GtkMenuItem          "Cantarell Bold 11"',
      'GtkToolbar           [unset]'
    ]);
    expect(toolkit.created).toBe(3);
    expect(toolkit.live).toBe(0);
  });
});

describe('GSettings reporter', () => {
  it('prints the interface font preferences', async () => {
    const preferences = new FakePreferences({
      'font-name': { kind: 'string', value: 'Cantarell 11' },
      'text-scaling-factor': { kind: 'float', value: 1.25 }
    });

    const section = await gnomeSettings.run(fakeContext({ preferences }));
    expect(section.title).toBe('GSettings (org.gnome.desktop.interface):');
    expect(section.rows).toEqual(['font-name            "Cantarell 11"', 'text-scaling-factor  1.25']);
  });

  it('marks missing keys and undecoded types', () => {
    expect(formatPreference({ kind: 'missing' })).toBe('[unset]');
    expect(formatPreference({ kind: 'int', value: 1 })).toBe('[unknown type]');
    expect(formatPreference({ kind: 'bool', value: false })).toBe('[unknown type]');
    expect(formatPreference({ kind: 'float', value: 1.125 })).toBe('1.12');
  });
});

describe('X display reporter', () => {
  it('prints the geometry and derived DPI', async () => {
    const section = await xDisplay.run(fakeContext());
    expect(section.title).toBe('X11 display info:');
    expect(section.rows).toEqual(['screen pixels        1920x1080', 'screen size          508x286 mm (96.00x95.92 DPI)']);
  });

  it('prints a zero physical size as infinite DPI', async () => {
    const geometry = { widthPx: 800, heightPx: 600, widthMm: 0, heightMm: 0 };
    const { rows } = await xDisplay.run(fakeContext({ geometry }));
    expect(rows[1]).toBe('screen size          0x0 mm (infxinf DPI)');
  });
});

describe('X resources reporter', () => {
  it('reports a missing database as failed', async () => {
    const section = await xResources.run(fakeContext({ resources: null }));
    expect(section).toEqual({ title: 'X resources (xrdb):', rows: ['[failed]'] });
  });

  it('looks up each Xft resource', async () => {
    const resources = 'Xft.antialias:\t1\nXft.dpi:\t96\n*rgba:\trgb\n';
    const { rows } = await xResources.run(fakeContext({ resources }));
    expect(rows).toEqual([
      'Xft.antialias        "1"',
      'Xft.hinting          [unset]',
      'Xft.hintstyle        [unset]',
      'Xft.rgba             "rgb"',
      'Xft.dpi              "96"'
    ]);
  });

  it('caps long values at 255 bytes', async () => {
    const resources = `Xft.hintstyle: ${'x'.repeat(300)}\n`;
    const { rows } = await xResources.run(fakeContext({ resources }));
    expect(rows[2]).toBe(`Xft.hintstyle        "${'x'.repeat(255)}"`);
  });
});

describe('XSETTINGS reporter', () => {
  it('prints the install hint when the helper fails', async () => {
    const section = await xSettings.run(fakeContext());
    expect(section).toEqual({
      title: 'XSETTINGS:',
      rows: [
        'Install dump_xsettings from https://code.google.com/p/xsettingsd/',
        'to print this information.'
      ]
    });
  });

  it('prints the install hint when nothing relevant is set', async () => {
    const xsettings = { ok: true as const, output: 'Net/ThemeName "Adwaita"\n' };
    const { rows } = await xSettings.run(fakeContext({ xsettings }));
    expect(rows).toEqual([...INSTALL_HINT]);
  });

  it('prints the font name and Xft settings', async () => {
    const output = 'Gtk/FontName "Cantarell 11"\nNet/ThemeName "Adwaita"\nXft/Antialias 1\nXft/DPI 98304\n';
    const { rows } = await xSettings.run(fakeContext({ xsettings: { ok: true, output } }));
    expect(rows).toEqual(['Gtk/FontName         "Cantarell 11"', 'Xft/Antialias        1', 'Xft/DPI              98304']);
  });
});

describe('Fontconfig reporter', () => {
  const MATCH = FcPattern.fromValues({
    family: { type: 'string', value: 'DejaVu Sans' },
    pixelsize: { type: 'double', value: 13.3333 },
    size: { type: 'double', value: 7.5 },
    antialias: { type: 'bool', value: 1 },
    hinting: { type: 'bool', value: 1 },
    hintstyle: { type: 'integer', value: 3 },
    rgba: { type: 'string', value: 'rgb' }
  });

  it('matches an explicit description with bold and italic', async () => {
    const fonts = new FakeFonts(MATCH);
    const ctx = fakeContext({ fonts, options: { bold: true, italic: true, fontDescription: 'DejaVu Sans 10px' } });

    const section = await fontconfig.run(ctx);
    expect(fonts.queries).toEqual([{ family: 'DejaVu Sans', weight: 200, slant: 100, size: { unit: 'pixels', value: 10 } }]);
    expect(section.title).toBe('Fontconfig (DejaVu Sans 10px):');
    expect(section.rows).toEqual([
      'requested weight     FC_WEIGHT_BOLD',
      'requested slant      FC_SLANT_ITALIC',
      'requested size       10.00 pixels',
      'family               DejaVu Sans',
      'pixelsize            13.33 pixels',
      'size                 7 points',
      'antialias            1',
      'hinting              1',
      'autohint             [no match]',
      'hintstyle            3 (full)',
      'rgba                 [type mismatch]'
    ]);
  });

  it('falls back to the theme font of a label', async () => {
    const toolkit = new FakeToolkit({}, { label: 'Cantarell 11' });
    const fonts = new FakeFonts();

    const section = await fontconfig.run(fakeContext({ toolkit, fonts }));
    expect(fonts.queries).toEqual([{ family: 'Cantarell', size: { unit: 'points', value: 11 } }]);
    expect(section.title).toBe('Fontconfig (Cantarell 11):');
    expect(section.rows[0]).toBe('requested size       11 points');
    expect(section.rows[1]).toBe('family               [no match]');
    expect(toolkit.live).toBe(0);
  });

  it('fails when neither -f nor the theme gives a font', () => {
    const toolkit = new FakeToolkit();
    expect(() => resolveDescription(fakeContext({ toolkit }))).toThrow(PreconditionError);
    expect(toolkit.live).toBe(0);
  });

  it('requests whole points for relative sizes', () => {
    const query = buildFontQuery(parseFontDescription('Sans 10.5'), { bold: false, italic: false });
    expect(query).toEqual({ family: 'Sans', size: { unit: 'points', value: 10 } });
  });

  it('names values outside the enumerations as invalid', async () => {
    const fonts = new FakeFonts(FcPattern.fromValues({
      hintstyle: { type: 'integer', value: 99 },
      rgba: { type: 'integer', value: 6 }
    }));
    const { rows } = await fontconfig.run(fakeContext({ fonts, options: { fontDescription: 'Sans 10' } }));
    expect(rows.slice(-2)).toEqual(['hintstyle            99 (invalid)', 'rgba                 6 (invalid)']);
  });
});
