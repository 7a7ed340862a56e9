/**
 * Small made-up eDNE extract around one municipality.
 */

export const LOCALITIES = [
    "16@AC@Rio Branco@@1@M@@Rio Branco@1200401",
    "10@AC@Sede Exemplo@69900000@0@M@@Sede Ex@",
    "900@AC@Povoado Teste@69939810@0@P@16@Pov Teste@",
    "901@AC@Vila Neta@69939820@0@P@900@@",
    "902@AC@Vila Solta@69939830@0@P@999@@",
].join("\n");

export const NEIGHBORHOODS = ["100@AC@16@Centro@Ctr", "101@AC@16@Bosque@"].join(
    "\n",
);

export const ADDRESSES = [
    "5000@AC@16@100@@Nelson Mesquita@@69900100@Rua@S@R N Mesquita",
    "5001@AC@16@100@101@Ceará@- até 500 - lado par@69900200@Avenida@N@",
    "5002@AC@4242@555@@Sem Cadastro@@69900300@Travessa@S@",
].join("\n");

export const BIG_USERS =
    "700@AC@16@100@5000@Hospital Exemplo@Rua Nelson Mesquita, 10@69900901@Hosp Ex";

export const OPERATIONAL_UNITS =
    "800@AC@16@100@@AC Rio Branco@Rua Epaminondas Jácome, 447@69900000@S@AC R Branco";

export const CPCS = "30@AC@16@CPC Ramal Um@Ramal Um, km 4@69928970";
